import { describe, expect, it } from 'vitest';
import { GrammarBuilder } from './builder.js';
import { runGrammar } from './engine.js';
import { udpGrammar } from './udp.js';

const bytes = (...values: number[]) => Uint8Array.from(values);

describe('runGrammar', () => {
  describe('uint fields', () => {
    it('should read big-endian integers by default', () => {
      const grammar = GrammarBuilder.create('test')
        .uint('a', 1)
        .uint('b', 2)
        .uint('c', 4)
        .build();

      const outcome = runGrammar(grammar, bytes(0x7f, 0x01, 0x02, 0, 0, 1, 0));

      expect(outcome).toEqual({
        success: true,
        tree: [
          { name: 'a', token: { kind: 'uint', value: 0x7f, width: 1 } },
          { name: 'b', token: { kind: 'uint', value: 0x0102, width: 2 } },
          { name: 'c', token: { kind: 'uint', value: 256, width: 4 } },
        ],
      });
    });

    it('should read little-endian integers', () => {
      const grammar = GrammarBuilder.create('test')
        .uint('a', 2, { endianness: 'little' })
        .uint('b', 4, { endianness: 'little' })
        .build();

      const outcome = runGrammar(grammar, bytes(0x01, 0x02, 0xff, 0, 0, 0));

      expect(outcome).toEqual({
        success: true,
        tree: [
          { name: 'a', token: { kind: 'uint', value: 0x0201, width: 2 } },
          { name: 'b', token: { kind: 'uint', value: 255, width: 4 } },
        ],
      });
    });

    it('should read the full unsigned range of a 4-byte field', () => {
      const grammar = GrammarBuilder.create('test').uint('a', 4).build();

      const outcome = runGrammar(grammar, bytes(0xff, 0xff, 0xff, 0xff));

      expect(outcome.success && outcome.tree[0]?.token).toEqual({
        kind: 'uint',
        value: 4294967295,
        width: 4,
      });
    });

    it('should fail with the field and offset when input runs out', () => {
      const grammar = GrammarBuilder.create('test')
        .uint('size', 1)
        .bytes('body', { lengthFrom: 'size' })
        .uint('trailer', 2)
        .build();

      const outcome = runGrammar(grammar, bytes(0, 5));

      expect(outcome).toEqual({
        success: false,
        reason: 'Expected 2 bytes for "trailer", got 1',
        field: 'trailer',
        offset: 1,
      });
    });
  });

  describe('bytes fields', () => {
    const grammar = GrammarBuilder.create('test')
      .uint('size', 1)
      .bytes('body', { lengthFrom: 'size' })
      .build();

    it('should repeat one-byte reads as many times as the length field says', () => {
      const outcome = runGrammar(grammar, bytes(2, 0xaa, 0xbb));

      expect(outcome).toEqual({
        success: true,
        tree: [
          { name: 'size', token: { kind: 'uint', value: 2, width: 1 } },
          {
            name: 'body',
            token: {
              kind: 'sequence',
              elements: [
                { kind: 'uint', value: 0xaa, width: 1 },
                { kind: 'uint', value: 0xbb, width: 1 },
              ],
            },
          },
        ],
      });
    });

    it('should accept an empty run', () => {
      const outcome = runGrammar(grammar, bytes(0));

      expect(outcome.success && outcome.tree[1]?.token).toEqual({
        kind: 'sequence',
        elements: [],
      });
    });

    it('should fail when fewer bytes remain than declared', () => {
      const outcome = runGrammar(grammar, bytes(3, 1, 2));

      expect(outcome).toEqual({
        success: false,
        reason: 'Expected 3 bytes for "body", got 2',
        field: 'body',
        offset: 1,
      });
    });

    it('should continue with fields after the run', () => {
      const withTrailer = GrammarBuilder.create('test')
        .uint('size', 1)
        .bytes('body', { lengthFrom: 'size' })
        .uint('trailer', 1)
        .build();

      const outcome = runGrammar(withTrailer, bytes(1, 9, 0x42));

      expect(outcome.success && outcome.tree[2]).toEqual({
        name: 'trailer',
        token: { kind: 'uint', value: 0x42, width: 1 },
      });
    });
  });

  it('should fail before reading fields when input is shorter than the fixed prefix', () => {
    const grammar = GrammarBuilder.create('test')
      .uint('a', 2)
      .uint('size', 2)
      .bytes('body', { lengthFrom: 'size' })
      .build();

    const outcome = runGrammar(grammar, bytes(0, 1, 0));

    expect(outcome).toEqual({
      success: false,
      reason: 'Input too short: expected at least 4 bytes, got 3',
      field: undefined,
      offset: 0,
    });
  });

  it('should reject trailing bytes', () => {
    const grammar = GrammarBuilder.create('test').uint('a', 1).build();

    const outcome = runGrammar(grammar, bytes(1, 2, 3));

    expect(outcome).toEqual({
      success: false,
      reason: 'Expected end of input, got 2 trailing bytes',
      field: undefined,
      offset: 1,
    });
  });

  it('should honour the byte offset of a subarray', () => {
    const backing = bytes(0xee, 0xee, 0x00, 0x05);

    const outcome = runGrammar(
      GrammarBuilder.create('test').uint('a', 2).build(),
      backing.subarray(2),
    );

    expect(outcome.success && outcome.tree[0]?.token).toEqual({
      kind: 'uint',
      value: 5,
      width: 2,
    });
  });

  it('should produce independent trees for repeated runs', () => {
    const input = bytes(0, 80, 0, 81, 0, 1, 0xab, 0xcd, 7);

    const first = runGrammar(udpGrammar, input);
    const second = runGrammar(udpGrammar, input);

    expect(first).toEqual(second);
    expect(first.success && second.success && first.tree !== second.tree).toBe(
      true,
    );
  });
});
