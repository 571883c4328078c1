// Grammar
export type {
  BytesField,
  BytesOptions,
  Endianness,
  FieldDefinition,
  Grammar,
  NamedToken,
  ParseFailure,
  ParseOutcome,
  ParseSuccess,
  ParseToken,
  ParseTree,
  SequenceToken,
  UintField,
  UintOptions,
  UintToken,
  UintWidth,
} from './grammar/index.js';
export {
  GrammarBuilder,
  GrammarValidationError,
  runGrammar,
  UDP_HEADER_SIZE,
  udpGrammar,
} from './grammar/index.js';

// Datagram
export type {
  Datagram,
  DatagramInit,
  DecodeResult,
  DecoderOptions,
  PayloadAllocator,
} from './datagram/index.js';
export {
  computeChecksum,
  DatagramDecoder,
  decodeDatagram,
  defaultDecoderOptions,
  encodeDatagram,
  extractDatagram,
  MAX_PAYLOAD_LENGTH,
  PAYLOAD_CAPACITY,
  resolveDecoderOptions,
  verifyChecksum,
} from './datagram/index.js';

// Codec
export type { Codec } from './codec/index.js';
export { createDatagramCodec, DatagramCodec } from './codec/index.js';

// Hooks
export type {
  DecodeErrorContext,
  DecodedContext,
  DecoderHooks,
  Logger,
} from './hooks/index.js';
export { consoleLogger, SafeHooks } from './hooks/index.js';

// Pipeline
export type { PipelineConfig, ProcessResult } from './pipeline/index.js';
export { DecodePipeline } from './pipeline/index.js';

// Errors
export type {
  DecodeError,
  DecodeErrorCode,
  HasDescription,
} from './errors/index.js';
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
  // Utility
  hasDescription,
} from './errors/index.js';
