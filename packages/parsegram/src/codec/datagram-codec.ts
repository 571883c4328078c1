import {
  DatagramDecoder,
  encodeDatagram,
  type Datagram,
  type DecoderOptions,
} from '../datagram/index.js';
import type { Codec } from './codec.js';

/**
 * Codec for datagrams that throws instead of returning a result.
 * Use DatagramDecoder directly to branch on the outcome without try/catch.
 */
export class DatagramCodec implements Codec<Datagram> {
  readonly contentType = 'application/vnd.parsegram.datagram';

  private readonly decoder: DatagramDecoder;

  constructor(options: Partial<DecoderOptions> = {}) {
    this.decoder = new DatagramDecoder(options);
  }

  encode(datagram: Datagram): Uint8Array {
    return encodeDatagram(datagram);
  }

  /**
   * @throws GrammarMismatchError, PayloadLengthOutOfRangeError or
   *   AllocationFailureError
   */
  decode(buffer: Uint8Array): Datagram {
    const result = this.decoder.decode(buffer);
    if (!result.ok) {
      throw result.error;
    }
    return result.datagram;
  }
}

/**
 * Creates a new datagram codec instance.
 */
export function createDatagramCodec(
  options: Partial<DecoderOptions> = {},
): DatagramCodec {
  return new DatagramCodec(options);
}
