import { InvalidDecoderOptionsError } from '../errors/index.js';
import type { DecoderOptions } from './types.js';

/** Default payload capacity of a decoded record. */
export const PAYLOAD_CAPACITY = 512;

/** Largest value the 16-bit length field can carry. */
export const MAX_PAYLOAD_LENGTH = 0xffff;

/**
 * Default configuration values.
 */
export const defaultDecoderOptions: DecoderOptions = {
  payloadCapacity: PAYLOAD_CAPACITY,
  allocatePayload: (size) => new Uint8Array(size),
};

/**
 * Merges options over the defaults and validates the result.
 * @throws InvalidDecoderOptionsError if an option is out of range
 */
export function resolveDecoderOptions(
  options: Partial<DecoderOptions> = {},
): DecoderOptions {
  const resolved = { ...defaultDecoderOptions, ...options };

  if (
    !Number.isInteger(resolved.payloadCapacity) ||
    resolved.payloadCapacity < 0 ||
    resolved.payloadCapacity > MAX_PAYLOAD_LENGTH
  ) {
    throw new InvalidDecoderOptionsError(
      `payloadCapacity must be an integer between 0 and ${MAX_PAYLOAD_LENGTH}, got ${resolved.payloadCapacity}`,
    );
  }

  if (typeof resolved.allocatePayload !== 'function') {
    throw new InvalidDecoderOptionsError('allocatePayload must be a function');
  }

  return resolved;
}
