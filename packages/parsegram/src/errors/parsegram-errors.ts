import type { HasDescription } from './has-description.js';

/**
 * Base class for all parsegram errors.
 * All errors have a unique name that appears in logs and a description
 * explaining the error and actions to resolve it.
 *
 * The `name` property is automatically set to the class name for proper
 * identification in error monitoring and logging systems.
 */
export abstract class ParsegramError extends Error implements HasDescription {
  /**
   * Error class name (e.g., "GrammarMismatchError").
   * This is preserved during serialization.
   */
  declare readonly name: string;

  /**
   * Human-readable description explaining what went wrong and
   * what ACTION the user should take to resolve the issue.
   */
  abstract readonly description: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    // Ensure name is preserved when serialized
    Object.defineProperty(this, 'name', {
      value: this.constructor.name,
      enumerable: true,
      configurable: false,
      writable: false,
    });
  }

  /**
   * Returns a serializable representation for logging/monitoring.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      description: this.description,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Decode outcomes
// ============================================================================

/**
 * Returned when the bytes do not satisfy the datagram grammar: the header is
 * truncated, the payload is shorter than declared, or bytes are left over.
 */
export class GrammarMismatchError extends ParsegramError {
  readonly code = 'GRAMMAR_MISMATCH' as const;

  readonly description =
    'The input bytes do not match the datagram layout. ' +
    'ACTION: Drop the datagram. Check the field and offset on this error to ' +
    'see where the input stopped matching; a truncated read or a sender ' +
    'that miscomputes the length field are the usual causes.';

  constructor(
    message: string,
    public readonly field?: string,
    public readonly offset?: number,
  ) {
    super(message);
  }
}

/**
 * Returned when the length field parsed but declares more payload bytes than
 * the record can hold.
 */
export class PayloadLengthOutOfRangeError extends ParsegramError {
  readonly code = 'PAYLOAD_LENGTH_OUT_OF_RANGE' as const;

  readonly description =
    'The datagram declares a payload larger than the payload capacity. ' +
    'ACTION: Drop the datagram. If senders legitimately use larger payloads, ' +
    'raise the payloadCapacity decoder option (maximum 65535).';

  constructor(
    public readonly payloadLength: number,
    public readonly capacity: number,
  ) {
    super(
      `Payload length ${payloadLength} exceeds payload capacity ${capacity}`,
    );
  }
}

/**
 * Returned when the payload buffer for a record could not be allocated.
 */
export class AllocationFailureError extends ParsegramError {
  readonly code = 'ALLOCATION_FAILURE' as const;

  readonly description =
    'Memory for the decoded payload could not be allocated. ' +
    'ACTION: Retry later or reduce the number of datagrams decoded at once. ' +
    'Check the cause property for the allocator error.';

  constructor(
    public readonly size: number,
    public override readonly cause?: unknown,
  ) {
    super(`Failed to allocate ${size} bytes for the datagram payload`);
  }
}

/**
 * Any outcome of a failed decode.
 */
export type DecodeError =
  | GrammarMismatchError
  | PayloadLengthOutOfRangeError
  | AllocationFailureError;

export type DecodeErrorCode = DecodeError['code'];

// ============================================================================
// Usage errors
// ============================================================================

/**
 * Thrown when decode is called with a length the buffer cannot satisfy.
 */
export class InvalidInputLengthError extends ParsegramError {
  readonly description =
    'The length passed to decode is negative, not an integer, or larger ' +
    'than the buffer. ' +
    'ACTION: Pass the number of bytes actually received, or omit the ' +
    'argument to decode the whole buffer.';

  constructor(
    public readonly length: number,
    public readonly bufferLength: number,
  ) {
    super(
      `Invalid input length ${length} for a buffer of ${bufferLength} bytes`,
    );
  }
}

/**
 * Thrown when decoder options fail validation.
 */
export class InvalidDecoderOptionsError extends ParsegramError {
  readonly description =
    'The decoder options are invalid. ' +
    'ACTION: payloadCapacity must be an integer between 0 and 65535, since ' +
    'the length field is a 16-bit unsigned integer.';
}

/**
 * Thrown when a datagram cannot be serialized.
 */
export class DatagramEncodeError extends ParsegramError {
  readonly description =
    'A datagram field is out of range for its wire width. ' +
    'ACTION: Ports and checksum must be integers between 0 and 65535 and the ' +
    'payload must not exceed 65535 bytes.';
}

export function isParsegramError(error: unknown): error is ParsegramError {
  return error instanceof ParsegramError;
}

export function isGrammarMismatchError(
  error: unknown,
): error is GrammarMismatchError {
  return error instanceof GrammarMismatchError;
}

export function isPayloadLengthOutOfRangeError(
  error: unknown,
): error is PayloadLengthOutOfRangeError {
  return error instanceof PayloadLengthOutOfRangeError;
}

export function isAllocationFailureError(
  error: unknown,
): error is AllocationFailureError {
  return error instanceof AllocationFailureError;
}

export function isDecodeError(error: unknown): error is DecodeError {
  return (
    isGrammarMismatchError(error) ||
    isPayloadLengthOutOfRangeError(error) ||
    isAllocationFailureError(error)
  );
}
