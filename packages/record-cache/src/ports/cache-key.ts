/**
 * A key in the backing store, before the keyspace prefix is applied.
 *
 * Either a primary record id or a secondary key built by the index catalog
 * as `<index-name>:<value-1>:<value-2>...`.
 *
 * @example
 * ```ts
 * const primary: CacheKey = "u1"
 * const secondary: CacheKey = "by_email:a@b.com"
 * ```
 */
export type CacheKey = string
