export type { Codec } from './codec.js';
export { createDatagramCodec, DatagramCodec } from './datagram-codec.js';
