/**
 * Codec interface for serializing/deserializing values to bytes.
 */
export interface Codec<T> {
  /**
   * Encodes a value to a buffer for transport.
   */
  encode(value: T): Uint8Array;

  /**
   * Decodes a buffer back to a value.
   * @throws Error if the buffer is invalid or cannot be decoded
   */
  decode(buffer: Uint8Array): T;

  /**
   * MIME content type for this codec.
   */
  readonly contentType: string;
}
