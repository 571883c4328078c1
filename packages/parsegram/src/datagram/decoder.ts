import { InvalidInputLengthError } from '../errors/index.js';
import { runGrammar, udpGrammar } from '../grammar/index.js';
import { extractDatagram } from './extractor.js';
import { resolveDecoderOptions } from './options.js';
import type { DecodeResult, DecoderOptions } from './types.js';

/**
 * Decodes datagrams into typed records.
 *
 * Options are validated once on construction. A decoder holds no per-call
 * state, so one instance can be shared freely.
 *
 * The payload capacity is checked after the grammar has matched, so a
 * datagram declaring an oversized payload is still tokenized in full (one
 * token per payload byte) before it is rejected. Nothing is allocated or
 * copied for the record until the length has passed the capacity check.
 */
export class DatagramDecoder {
  private readonly options: DecoderOptions;

  constructor(options: Partial<DecoderOptions> = {}) {
    this.options = resolveDecoderOptions(options);
  }

  get payloadCapacity(): number {
    return this.options.payloadCapacity;
  }

  /**
   * Decodes the first `length` bytes of `buffer`. The buffer is not modified.
   * @throws InvalidInputLengthError if length is not an integer in
   *   [0, buffer.length]
   */
  decode(buffer: Uint8Array, length: number = buffer.length): DecodeResult {
    if (!Number.isSafeInteger(length) || length < 0 || length > buffer.length) {
      throw new InvalidInputLengthError(length, buffer.length);
    }

    const outcome = runGrammar(udpGrammar, buffer.subarray(0, length));
    return extractDatagram(outcome, this.options);
  }
}

const defaultDecoder = new DatagramDecoder();

/**
 * Decodes a datagram with the default options (payload capacity 512).
 */
export function decodeDatagram(
  buffer: Uint8Array,
  length: number = buffer.length,
): DecodeResult {
  return defaultDecoder.decode(buffer, length);
}
