import type { DecodeError } from '../errors/index.js';

/**
 * A decoded datagram.
 * Every field is copied out of the input, so a record never aliases the
 * buffer it was decoded from.
 */
export interface Datagram {
  readonly sourcePort: number;
  readonly destinationPort: number;
  /** Number of payload bytes; always equals payload.length */
  readonly payloadLength: number;
  /** Carried as received; the decoder does not verify it */
  readonly checksum: number;
  readonly payload: Uint8Array;
}

/**
 * Fields needed to serialize a datagram. The length field is derived from
 * the payload and the checksum defaults to the payload byte sum.
 */
export interface DatagramInit {
  readonly sourcePort: number;
  readonly destinationPort: number;
  readonly payload: Uint8Array;
  readonly checksum?: number | undefined;
}

export type DecodeResult =
  | { readonly ok: true; readonly datagram: Datagram }
  | { readonly ok: false; readonly error: DecodeError };

/**
 * Allocates the payload buffer of a record.
 */
export type PayloadAllocator = (size: number) => Uint8Array;

/**
 * Decoder options.
 */
export interface DecoderOptions {
  /**
   * Maximum payload length accepted. Datagrams declaring more are rejected
   * with PayloadLengthOutOfRangeError. Default: 512
   */
  readonly payloadCapacity: number;

  /**
   * Payload allocator. A RangeError thrown here is reported as
   * AllocationFailureError. Default: `new Uint8Array(size)`
   */
  readonly allocatePayload: PayloadAllocator;
}
