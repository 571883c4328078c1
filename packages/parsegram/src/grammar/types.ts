/**
 * Byte order of a multi-byte integer field.
 */
export type Endianness = 'big' | 'little';

/**
 * Supported widths, in bytes, of an unsigned integer field.
 */
export type UintWidth = 1 | 2 | 4;

/**
 * Fixed-width unsigned integer field.
 */
export interface UintField {
  readonly kind: 'uint';
  readonly name: string;
  readonly width: UintWidth;
  readonly endianness: Endianness;
}

/**
 * Variable-length run of single bytes whose count is the value decoded for
 * an earlier uint field.
 */
export interface BytesField {
  readonly kind: 'bytes';
  readonly name: string;
  /** Name of the uint field holding the element count */
  readonly lengthFrom: string;
}

export type FieldDefinition = UintField | BytesField;

/**
 * Immutable, validated description of a binary layout.
 * Build one with GrammarBuilder; a grammar can be shared across any number
 * of decode calls.
 */
export interface Grammar {
  readonly name: string;
  readonly fields: readonly FieldDefinition[];
  /**
   * Number of bytes taken by the fields before the first bytes field, and so
   * the minimum input length.
   */
  readonly fixedSize: number;
}

/**
 * A single token of a parse tree.
 */
export type ParseToken = UintToken | SequenceToken;

export interface UintToken {
  readonly kind: 'uint';
  readonly value: number;
  readonly width: UintWidth;
}

export interface SequenceToken {
  readonly kind: 'sequence';
  readonly elements: readonly ParseToken[];
}

/**
 * A token labelled with the grammar field that produced it.
 */
export interface NamedToken {
  readonly name: string;
  readonly token: ParseToken;
}

/**
 * Ordered tokens, one per grammar field.
 */
export type ParseTree = readonly NamedToken[];

export interface ParseSuccess {
  readonly success: true;
  readonly tree: ParseTree;
}

export interface ParseFailure {
  readonly success: false;
  /** Why the input stopped matching */
  readonly reason: string;
  /** Field being read when matching failed, if any */
  readonly field?: string | undefined;
  /** Byte offset at which matching failed */
  readonly offset: number;
}

export type ParseOutcome = ParseSuccess | ParseFailure;
