import { describe, expect, it } from 'vitest';
import { DatagramDecoder, decodeDatagram } from '../datagram/index.js';
import {
  DatagramGenerator,
  type InvalidDatagramKind,
  seededRandom,
} from './datagram-generator.js';

const KINDS: readonly InvalidDatagramKind[] = [
  'truncated-header',
  'short-payload',
  'trailing-bytes',
  'oversized-length',
];

describe('seededRandom', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = seededRandom(42);
    const b = seededRandom(42);

    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
  });

  it('should stay within [0, 1)', () => {
    const random = seededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('DatagramGenerator', () => {
  describe('valid', () => {
    it('should produce datagrams that decode to the expected record', () => {
      const generator = new DatagramGenerator({ random: seededRandom(1) });

      for (let i = 0; i < 200; i++) {
        const { bytes, expected } = generator.valid();

        expect(decodeDatagram(bytes)).toEqual({ ok: true, datagram: expected });
      }
    });

    it('should honour fixed fields', () => {
      const generator = new DatagramGenerator({ random: seededRandom(2) });

      const { expected } = generator.valid({
        sourcePort: 80,
        destinationPort: 443,
        payloadLength: 512,
      });

      expect(expected.sourcePort).toBe(80);
      expect(expected.destinationPort).toBe(443);
      expect(expected.payloadLength).toBe(512);
      expect(expected.payload).toHaveLength(512);
    });

    it('should respect the configured capacity', () => {
      const generator = new DatagramGenerator({
        random: () => 0.999999,
        payloadCapacity: 10,
      });

      expect(generator.valid().expected.payloadLength).toBe(10);
    });
  });

  describe('invalid', () => {
    it.each(KINDS)('should produce %s datagrams the decoder rejects', (kind) => {
      const generator = new DatagramGenerator({ random: seededRandom(3) });

      for (let i = 0; i < 25; i++) {
        const sample = generator.invalid(kind);
        const result = decodeDatagram(sample.bytes);

        expect(sample.kind).toBe(kind);
        expect(result.ok).toBe(false);
        expect(!result.ok && result.error.code).toBe(sample.expectedCode);
      }
    });

    it('should keep truncated headers under 8 bytes', () => {
      const generator = new DatagramGenerator({ random: () => 0.999999 });

      expect(generator.invalid('truncated-header').bytes).toHaveLength(7);
    });

    it('should exceed a custom capacity for oversized lengths', () => {
      const generator = new DatagramGenerator({
        random: () => 0,
        payloadCapacity: 100,
      });
      const decoder = new DatagramDecoder({ payloadCapacity: 100 });

      const sample = generator.invalid('oversized-length');
      const result = decoder.decode(sample.bytes);

      expect(sample.bytes).toHaveLength(8 + 101);
      expect(!result.ok && result.error.message).toBe(
        'Payload length 101 exceeds payload capacity 100',
      );
    });

    it('should refuse oversized lengths when the capacity is the maximum', () => {
      const generator = new DatagramGenerator({ payloadCapacity: 65535 });

      expect(() => generator.invalid('oversized-length')).toThrow(RangeError);
    });
  });
});
