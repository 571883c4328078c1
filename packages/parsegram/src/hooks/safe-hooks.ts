import {
  type DecodeErrorContext,
  type DecodedContext,
  type DecoderHooks,
  type Logger,
  consoleLogger,
} from './types.js';

/**
 * Wraps hooks with error handling to prevent hook errors from breaking processing.
 * All hooks become safe to call and will catch any errors internally.
 */
export class SafeHooks {
  private readonly hooks: DecoderHooks;

  /** The logger instance used by the pipeline. */
  readonly logger: Logger;

  constructor(hooks: DecoderHooks = {}) {
    this.hooks = hooks;
    this.logger = hooks.logger ?? consoleLogger;
  }

  async onDecoded(context: DecodedContext): Promise<void> {
    await this.safeCall('onDecoded', () => this.hooks.onDecoded?.(context));
  }

  async onDecodeError(context: DecodeErrorContext): Promise<void> {
    await this.safeCall('onDecodeError', () =>
      this.hooks.onDecodeError?.(context),
    );
  }

  private async safeCall(
    hookName: string,
    fn: () => void | Promise<void> | undefined,
  ): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.logger.warn(`[parsegram] Hook ${hookName} threw an error`, error);
    }
  }
}
