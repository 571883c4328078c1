import { DatagramEncodeError } from '../errors/index.js';
import { UDP_HEADER_SIZE } from '../grammar/index.js';
import { MAX_PAYLOAD_LENGTH } from './options.js';
import type { Datagram, DatagramInit } from './types.js';

const MAX_U16 = 0xffff;

/**
 * Sum of the payload bytes, truncated to 16 bits.
 */
export function computeChecksum(payload: Uint8Array): number {
  let sum = 0;
  for (const byte of payload) {
    sum = (sum + byte) & MAX_U16;
  }
  return sum;
}

/**
 * Whether a datagram's checksum field matches its payload.
 */
export function verifyChecksum(datagram: Datagram): boolean {
  return datagram.checksum === computeChecksum(datagram.payload);
}

/**
 * Serializes a datagram: an 8-byte big-endian header followed by the payload.
 * @throws DatagramEncodeError if a field does not fit its wire width
 */
export function encodeDatagram(init: DatagramInit): Uint8Array {
  const checksum = init.checksum ?? computeChecksum(init.payload);

  assertU16('sourcePort', init.sourcePort);
  assertU16('destinationPort', init.destinationPort);
  assertU16('checksum', checksum);
  if (init.payload.length > MAX_PAYLOAD_LENGTH) {
    throw new DatagramEncodeError(
      `Payload of ${init.payload.length} bytes exceeds ${MAX_PAYLOAD_LENGTH}`,
    );
  }

  const buffer = new Uint8Array(UDP_HEADER_SIZE + init.payload.length);
  const view = new DataView(buffer.buffer);
  view.setUint16(0, init.sourcePort);
  view.setUint16(2, init.destinationPort);
  view.setUint16(4, init.payload.length);
  view.setUint16(6, checksum);
  buffer.set(init.payload, UDP_HEADER_SIZE);

  return buffer;
}

function assertU16(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_U16) {
    throw new DatagramEncodeError(
      `${field} must be an integer between 0 and ${MAX_U16}, got ${value}`,
    );
  }
}
