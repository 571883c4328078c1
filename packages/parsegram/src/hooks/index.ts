export { SafeHooks } from './safe-hooks.js';
export type {
  DecodeErrorContext,
  DecodedContext,
  DecoderHooks,
  Logger,
} from './types.js';
export { consoleLogger } from './types.js';
