/**
 * Errors that carry a human-readable description with an ACTION hint.
 */
export interface HasDescription {
  readonly description: string;
}

export function hasDescription(error: unknown): error is HasDescription {
  return (
    typeof error === 'object' &&
    error !== null &&
    'description' in error &&
    typeof error.description === 'string'
  );
}
