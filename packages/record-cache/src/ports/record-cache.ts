import type { Seconds } from "@recache/clock"
import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"
import type { CacheResult } from "./cache-result"
import type { IndexTuple, IndexValue } from "./index-definition"

/**
 * Index values for one lookup. A single scalar stands for a one-field tuple.
 */
export type IndexLookup = IndexValue | IndexTuple

/**
 * A read-through record cache with negative caching and secondary indexes.
 *
 * @remarks
 * The cache never talks to the source of truth. Callers fetch first; on
 * `absent` they query their own store and then call `store` with the record,
 * or `addMissing` when nothing was found, so the next lookup answers
 * `negative` without reaching the source of truth.
 */
export interface RecordCache<T> {
  fetch(id: CacheKey): Promise<CacheResult<T>>

  /** One round trip; results are in input order. */
  fetchMany(ids: readonly CacheKey[]): Promise<CacheResult<T>[]>

  /** Resolves a secondary key to the record in one atomic server-side step. */
  fetchByIndex(index: string, values: IndexLookup): Promise<CacheResult<T>>

  /** One pipelined round trip; results are in input order. */
  fetchManyByIndex(index: string, lookups: readonly IndexLookup[]): Promise<CacheResult<T>[]>

  /**
   * Writes the record and one entry per configured index, all with the cache
   * TTL.
   *
   * @remarks
   * With indexes the writes are pipelined, not transactional: a dropped
   * connection can leave the primary written without some of its index
   * entries, or the reverse.
   */
  store(id: CacheKey, record: T): Promise<true>

  storeMany(entries: readonly CacheEntry<T>[]): Promise<true>

  /** Remembers that the record does not exist. `ttl` overrides the cache TTL. */
  addMissing(id: CacheKey, ttl?: Seconds): Promise<true>

  addMissingMany(ids: readonly CacheKey[], ttl?: Seconds): Promise<true[]>

  /** Remembers that no record matches the index values. */
  addMissingByIndex(index: string, values: IndexLookup, ttl?: Seconds): Promise<true>
}
