import type { Datagram } from '../datagram/index.js';
import type { DecodeError } from '../errors/index.js';

/**
 * Logger interface for parsegram logging.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Default logger that uses console.
 */
export const consoleLogger: Logger = {
  debug: (message, ...args) => console.debug(message, ...args),
  info: (message, ...args) => console.info(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
  error: (message, ...args) => console.error(message, ...args),
};

/**
 * Context for the decoded hook.
 */
export interface DecodedContext {
  readonly datagram: Datagram;
  readonly rawMessage: Uint8Array;
  /** Where the datagram came from (e.g., a peer address), if known */
  readonly source?: string | undefined;
  readonly durationMs: number;
}

/**
 * Context for the decode error hook.
 */
export interface DecodeErrorContext {
  readonly error: DecodeError;
  readonly rawMessage: Uint8Array;
  /** Where the datagram came from (e.g., a peer address), if known */
  readonly source?: string | undefined;
  readonly durationMs: number;
}

/**
 * All available hooks.
 */
export interface DecoderHooks {
  /**
   * Logger for pipeline logging.
   * Defaults to console logger if not provided.
   */
  logger?: Logger;

  /**
   * Called when a datagram decodes successfully.
   */
  onDecoded?(context: DecodedContext): void | Promise<void>;

  /**
   * Called when a datagram is rejected.
   */
  onDecodeError?(context: DecodeErrorContext): void | Promise<void>;
}
