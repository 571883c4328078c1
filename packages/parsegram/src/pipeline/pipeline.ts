import { DatagramDecoder, type Datagram } from '../datagram/index.js';
import type { DecodeError } from '../errors/index.js';
import { SafeHooks } from '../hooks/index.js';

/**
 * Configuration for the decode pipeline.
 */
export interface PipelineConfig {
  /** Hooks and logger. Defaults to no hooks and the console logger. */
  readonly hooks?: SafeHooks | undefined;
  /** Decoder to use. Defaults to a decoder with default options. */
  readonly decoder?: DatagramDecoder | undefined;
}

/**
 * Result of pipeline processing.
 */
export interface ProcessResult {
  readonly success: boolean;
  readonly datagram?: Datagram | undefined;
  readonly error?: DecodeError | undefined;
  readonly durationMs: number;
}

/**
 * Decode pipeline for incoming datagrams.
 *
 * Handles the receive side of a datagram:
 * 1. Decode the raw bytes
 * 2. Report the outcome through hooks
 * 3. Log rejected datagrams
 *
 * Rejections are returned, never thrown; whether to drop, count or retry
 * is up to the caller.
 */
export class DecodePipeline {
  private readonly hooks: SafeHooks;
  private readonly decoder: DatagramDecoder;

  constructor(config: PipelineConfig = {}) {
    this.hooks = config.hooks ?? new SafeHooks();
    this.decoder = config.decoder ?? new DatagramDecoder();
  }

  /**
   * Processes one raw datagram.
   */
  async process(
    rawMessage: Uint8Array,
    source?: string,
  ): Promise<ProcessResult> {
    const startTime = performance.now();

    const result = this.decoder.decode(rawMessage);
    const durationMs = performance.now() - startTime;

    if (!result.ok) {
      this.hooks.logger.warn(
        `[parsegram] Rejected datagram (${result.error.code})`,
        {
          source,
          bytes: rawMessage.length,
          reason: result.error.message,
        },
      );
      await this.hooks.onDecodeError({
        error: result.error,
        rawMessage,
        source,
        durationMs,
      });
      return { success: false, error: result.error, durationMs };
    }

    const { datagram } = result;
    this.hooks.logger.debug(
      `[parsegram] Decoded datagram ${datagram.sourcePort} -> ${datagram.destinationPort}`,
      { source, payloadLength: datagram.payloadLength },
    );
    await this.hooks.onDecoded({ datagram, rawMessage, source, durationMs });

    return { success: true, datagram, durationMs };
  }

  /**
   * Processes datagrams one after another, returning results in input order.
   */
  async processBatch(
    rawMessages: readonly Uint8Array[],
    source?: string,
  ): Promise<ProcessResult[]> {
    const results: ProcessResult[] = [];
    for (const rawMessage of rawMessages) {
      results.push(await this.process(rawMessage, source));
    }
    return results;
  }
}
