import type { CacheKey } from "./cache-key"

/**
 * A primary id and record pair used for bulk writes.
 */
export type CacheEntry<T> = readonly [CacheKey, T]
