/**
 * Codec defines a bidirectional transformation between a record `T` and the
 * bytes stored in the backing store.
 *
 * @remarks
 * The cache treats codec output as opaque, with one exception: an encoding
 * equal to the negative marker (`"0"`) is rejected on write, since it could
 * not be told apart from a remembered miss.
 *
 * @example
 * ```ts
 * const userCodec: Codec<User> = {
 *   encode(value) {
 *     return new TextEncoder().encode(JSON.stringify(value))
 *   },
 *   decode(bytes) {
 *     return UserSchema.parse(JSON.parse(new TextDecoder().decode(bytes)))
 *   },
 * }
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  /**
   * May throw when the stored bytes are not a valid encoding. The cache wraps
   * the failure in a `decode_error`.
   */
  decode(bytes: Uint8Array): T
}
