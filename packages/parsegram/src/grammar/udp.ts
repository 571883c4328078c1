import { GrammarBuilder } from './builder.js';

/** Size of the fixed datagram header: four big-endian u16 fields. */
export const UDP_HEADER_SIZE = 8;

/**
 * Datagram layout, all integers big-endian:
 * | sourcePort (2B) | destinationPort (2B) | payloadLength (2B) | checksum (2B) | payload (payloadLength B) |
 */
export const udpGrammar = GrammarBuilder.create('udp')
  .uint('sourcePort', 2)
  .uint('destinationPort', 2)
  .uint('payloadLength', 2)
  .uint('checksum', 2)
  .bytes('payload', { lengthFrom: 'payloadLength' })
  .build();
