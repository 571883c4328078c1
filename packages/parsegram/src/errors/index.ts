export type { HasDescription } from './has-description.js';
export { hasDescription } from './has-description.js';

export type { DecodeError, DecodeErrorCode } from './parsegram-errors.js';
export {
  // Base class
  ParsegramError,
  isParsegramError,

  // Decode outcomes
  GrammarMismatchError,
  isGrammarMismatchError,
  PayloadLengthOutOfRangeError,
  isPayloadLengthOutOfRangeError,
  AllocationFailureError,
  isAllocationFailureError,
  isDecodeError,

  // Usage errors
  InvalidInputLengthError,
  InvalidDecoderOptionsError,
  DatagramEncodeError,
} from './parsegram-errors.js';
