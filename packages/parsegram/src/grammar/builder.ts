import type { HasDescription } from '../errors/index.js';
import type {
  Endianness,
  FieldDefinition,
  Grammar,
  UintWidth,
} from './types.js';

/**
 * Options for adding a uint field.
 */
export interface UintOptions {
  /** Byte order. Defaults to 'big' (network order). */
  readonly endianness?: Endianness | undefined;
}

/**
 * Options for adding a bytes field.
 */
export interface BytesOptions {
  /** Name of an earlier uint field whose value is the byte count */
  readonly lengthFrom: string;
}

const SUPPORTED_WIDTHS: readonly number[] = [1, 2, 4];
const FIELD_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]*$/;

/**
 * Error thrown when grammar validation fails.
 */
export class GrammarValidationError extends Error implements HasDescription {
  readonly description =
    'The grammar definition is invalid. Check the issues array for ' +
    'specific validation failures such as duplicate field names, ' +
    'unsupported integer widths, or a bytes field whose length refers to a ' +
    'field that is not an earlier uint. This error occurs when the grammar ' +
    'is built and must be fixed in the definition.';

  constructor(
    message: string,
    public readonly issues: readonly string[],
  ) {
    super(message);
    this.name = 'GrammarValidationError';
  }
}

/**
 * Fluent builder for binary grammars.
 *
 * @example
 * ```typescript
 * const grammar = GrammarBuilder.create('record')
 *   .uint('kind', 1)
 *   .uint('size', 2)
 *   .bytes('body', { lengthFrom: 'size' })
 *   .build();
 * ```
 */
export class GrammarBuilder {
  /**
   * Creates a new GrammarBuilder instance.
   */
  static create(name: string): GrammarBuilder {
    return new GrammarBuilder(name);
  }

  private readonly fields: FieldDefinition[] = [];

  private constructor(private readonly name: string) {}

  /**
   * Appends a fixed-width unsigned integer field.
   */
  uint(name: string, width: UintWidth, options: UintOptions = {}): this {
    this.fields.push({
      kind: 'uint',
      name,
      width,
      endianness: options.endianness ?? 'big',
    });
    return this;
  }

  /**
   * Appends a run of single bytes sized by an earlier uint field.
   */
  bytes(name: string, options: BytesOptions): this {
    this.fields.push({ kind: 'bytes', name, lengthFrom: options.lengthFrom });
    return this;
  }

  /**
   * Validates the grammar definition.
   */
  validate(): readonly string[] {
    const issues: string[] = [];

    if (this.name.trim() === '') {
      issues.push('Grammar name is required');
    }

    if (this.fields.length === 0) {
      issues.push('At least one field is required');
    }

    const uintNames = new Set<string>();
    const seen = new Set<string>();
    for (const field of this.fields) {
      if (field.name.trim() === '') {
        issues.push('Field name cannot be empty');
      } else if (!FIELD_NAME_PATTERN.test(field.name)) {
        issues.push(
          `Field name "${field.name}" must start with a letter and contain only alphanumeric characters and underscores`,
        );
      } else if (seen.has(field.name)) {
        issues.push(`Duplicate field name: "${field.name}"`);
      }
      seen.add(field.name);

      if (field.kind === 'uint') {
        if (!SUPPORTED_WIDTHS.includes(field.width)) {
          issues.push(
            `Field "${field.name}" width must be 1, 2 or 4 bytes, got ${field.width}`,
          );
        }
        if (field.endianness !== 'big' && field.endianness !== 'little') {
          issues.push(
            `Field "${field.name}" endianness must be "big" or "little"`,
          );
        }
        uintNames.add(field.name);
      } else if (!uintNames.has(field.lengthFrom)) {
        issues.push(
          `Field "${field.name}" takes its length from "${field.lengthFrom}", which is not an earlier uint field`,
        );
      }
    }

    return issues;
  }

  /**
   * Builds an immutable grammar.
   * @throws GrammarValidationError if validation fails
   */
  build(): Grammar {
    const issues = this.validate();
    if (issues.length > 0) {
      throw new GrammarValidationError(
        `Invalid grammar "${this.name}": ${issues.join('; ')}`,
        issues,
      );
    }

    let fixedSize = 0;
    for (const field of this.fields) {
      if (field.kind === 'bytes') break;
      fixedSize += field.width;
    }

    return Object.freeze({
      name: this.name,
      fields: Object.freeze(
        this.fields.map((field) => Object.freeze({ ...field })),
      ),
      fixedSize,
    });
  }
}
