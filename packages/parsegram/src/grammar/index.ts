export type {
  BytesOptions,
  UintOptions,
} from './builder.js';
export { GrammarBuilder, GrammarValidationError } from './builder.js';

export { runGrammar } from './engine.js';

export type {
  BytesField,
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
  UintToken,
  UintWidth,
} from './types.js';

export { UDP_HEADER_SIZE, udpGrammar } from './udp.js';
