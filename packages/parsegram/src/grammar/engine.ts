import type {
  Grammar,
  NamedToken,
  ParseFailure,
  ParseOutcome,
  ParseToken,
  UintField,
} from './types.js';

/**
 * Runs a grammar against a byte buffer.
 *
 * Fields are consumed in declaration order starting at offset 0. A bytes
 * field repeats a single-byte read exactly as many times as the value
 * already decoded for its `lengthFrom` field. The whole input must be
 * consumed: leftover bytes fail the parse. Input shorter than the grammar's
 * fixed-size prefix fails before any field is read.
 *
 * The grammar is only read, so one grammar may serve concurrent callers.
 * The returned tree is new on every call.
 */
export function runGrammar(grammar: Grammar, bytes: Uint8Array): ParseOutcome {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const values = new Map<string, number>();
  const tree: NamedToken[] = [];
  let offset = 0;

  if (bytes.length < grammar.fixedSize) {
    return failure(
      `Input too short: expected at least ${grammar.fixedSize} bytes, got ${bytes.length}`,
      0,
    );
  }

  for (const field of grammar.fields) {
    if (field.kind === 'uint') {
      if (offset + field.width > bytes.length) {
        return failure(
          `Expected ${field.width} bytes for "${field.name}", got ${bytes.length - offset}`,
          offset,
          field.name,
        );
      }
      const value = readUint(view, offset, field);
      values.set(field.name, value);
      tree.push({
        name: field.name,
        token: { kind: 'uint', value, width: field.width },
      });
      offset += field.width;
    } else {
      const count = values.get(field.lengthFrom);
      if (count === undefined) {
        return failure(
          `Length field "${field.lengthFrom}" for "${field.name}" was not parsed`,
          offset,
          field.name,
        );
      }
      if (offset + count > bytes.length) {
        return failure(
          `Expected ${count} bytes for "${field.name}", got ${bytes.length - offset}`,
          offset,
          field.name,
        );
      }
      tree.push({ name: field.name, token: readBytes(bytes, offset, count) });
      offset += count;
    }
  }

  if (offset !== bytes.length) {
    return failure(
      `Expected end of input, got ${bytes.length - offset} trailing bytes`,
      offset,
    );
  }

  return { success: true, tree };
}

function readUint(view: DataView, offset: number, field: UintField): number {
  const littleEndian = field.endianness === 'little';
  switch (field.width) {
    case 1:
      return view.getUint8(offset);
    case 2:
      return view.getUint16(offset, littleEndian);
    case 4:
      return view.getUint32(offset, littleEndian);
  }
}

function readBytes(
  bytes: Uint8Array,
  offset: number,
  count: number,
): ParseToken {
  const elements: ParseToken[] = new Array<ParseToken>(count);
  for (let i = 0; i < count; i++) {
    // offset + count was bounds-checked by the caller
    elements[i] = { kind: 'uint', value: bytes[offset + i] ?? 0, width: 1 };
  }
  return { kind: 'sequence', elements };
}

function failure(
  reason: string,
  offset: number,
  field?: string,
): ParseFailure {
  return { success: false, reason, offset, field };
}
