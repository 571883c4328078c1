export type {
  Datagram,
  DatagramInit,
  DecodeResult,
  DecoderOptions,
  PayloadAllocator,
} from './types.js';

export {
  defaultDecoderOptions,
  MAX_PAYLOAD_LENGTH,
  PAYLOAD_CAPACITY,
  resolveDecoderOptions,
} from './options.js';

export { extractDatagram } from './extractor.js';
export { DatagramDecoder, decodeDatagram } from './decoder.js';
export { computeChecksum, encodeDatagram, verifyChecksum } from './encoder.js';
