import type { Seconds } from "@recache/clock"
import { createNullLogger, type Logger } from "@recache/logger"
import type { BackingStore, RawValue } from "../ports/backing-store"
import type { CacheEntry } from "../ports/cache-entry"
import type { CacheKey } from "../ports/cache-key"
import type { CacheResult } from "../ports/cache-result"
import type { Codec } from "../ports/codec"
import type { IndexTuple } from "../ports/index-definition"
import type { IndexLookup, RecordCache } from "../ports/record-cache"
import type { RecordCacheConfig } from "../ports/record-cache-config"
import { BatchExecutor, type BatchWrite, toSetOptions } from "./batch-executor"
import { BackingStoreProtocolError } from "./errors/backing-store-protocol-error"
import { RecordCacheError } from "./errors/record-cache-error"
import { IndexCatalog } from "./index-catalog"
import { isNegativeMarker, negativeMarkerBytes } from "./negative-marker"
import { SecondaryResolver } from "./secondary-resolver"

export type RecordCacheStoreDeps<T> = {
  backend: BackingStore
  codec: Codec<T>
  logger?: Logger
}

const encoder = new TextEncoder()

export class RecordCacheStore<T extends object> implements RecordCache<T> {
  readonly catalog: IndexCatalog

  private readonly backend: BackingStore
  private readonly codec: Codec<T>
  private readonly logger: Logger
  private readonly resolver: SecondaryResolver
  private readonly batch: BatchExecutor

  constructor(
    deps: RecordCacheStoreDeps<T>,
    private readonly config: RecordCacheConfig,
  ) {
    this.backend = deps.backend
    this.codec = deps.codec
    this.catalog = new IndexCatalog(config.indexes)
    this.resolver = new SecondaryResolver(deps.backend, config.keyspacePrefix)
    this.batch = new BatchExecutor({ store: deps.backend, resolver: this.resolver })
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "record-cache",
      cache: config.keyspacePrefix,
    })
  }

  async fetch(id: CacheKey): Promise<CacheResult<T>> {
    const key = this.fullKey(assertId(id))
    const raw = await this.backend.get(key)

    return this.classify(key, raw)
  }

  async fetchMany(ids: readonly CacheKey[]): Promise<CacheResult<T>[]> {
    const keys = ids.map((id) => this.fullKey(assertId(id)))
    if (keys.length === 0) return []

    this.logger.debug("Fetching records", { count: keys.length })
    const raws = await this.batch.getMany(keys)

    return raws.map((raw, i) => this.classify(keys[i] ?? "", raw))
  }

  async fetchByIndex(index: string, values: IndexLookup): Promise<CacheResult<T>> {
    const key = this.indexKey(index, values)
    const raw = await this.resolver.resolve(key)

    return this.classify(key, raw)
  }

  async fetchManyByIndex(
    index: string,
    lookups: readonly IndexLookup[],
  ): Promise<CacheResult<T>[]> {
    this.catalog.get(index)

    const keys = lookups.map((values) => this.indexKey(index, values))
    if (keys.length === 0) return []

    this.logger.debug("Resolving secondary keys", { index, count: keys.length })
    const raws = await this.batch.resolveMany(keys)

    return raws.map((raw, i) => this.classify(keys[i] ?? "", raw))
  }

  async store(id: CacheKey, record: T): Promise<true> {
    const writes = this.writesFor(id, record)
    const [primary] = writes

    if (writes.length === 1 && primary !== undefined) {
      const acked = await this.backend.set(
        primary.key,
        primary.value,
        toSetOptions(primary.ttlSeconds),
      )

      return assertAcked(acked)
    }

    this.logger.debug("Storing record with secondary keys", { indexes: writes.length - 1 })
    await this.batch.setMany(writes)

    return true
  }

  async storeMany(entries: readonly CacheEntry<T>[]): Promise<true> {
    const writes = entries.flatMap(([id, record]) => this.writesFor(id, record))
    if (writes.length === 0) return true

    this.logger.debug("Storing records", { count: entries.length, writes: writes.length })
    await this.batch.setMany(writes)

    return true
  }

  async addMissing(id: CacheKey, ttl?: Seconds): Promise<true> {
    const key = this.fullKey(assertId(id))
    const acked = await this.backend.set(
      key,
      negativeMarkerBytes(),
      toSetOptions(this.resolveTtl(ttl)),
    )

    return assertAcked(acked)
  }

  async addMissingMany(ids: readonly CacheKey[], ttl?: Seconds): Promise<true[]> {
    const ttlSeconds = this.resolveTtl(ttl)
    const writes = ids.map((id) => ({
      key: this.fullKey(assertId(id)),
      value: negativeMarkerBytes(),
      ttlSeconds,
    }))

    return this.batch.setMany(writes)
  }

  async addMissingByIndex(index: string, values: IndexLookup, ttl?: Seconds): Promise<true> {
    const key = this.indexKey(index, values)
    const acked = await this.backend.set(
      key,
      negativeMarkerBytes(),
      toSetOptions(this.resolveTtl(ttl)),
    )

    return assertAcked(acked)
  }

  /** Primary write first, then one write per index mapping to the primary id. */
  private writesFor(id: CacheKey, record: T): BatchWrite[] {
    const primaryId = assertId(id)
    const ttlSeconds = this.config.ttl
    const secondaryKeys = this.catalog.keysForRecord(record)

    return [
      { key: this.fullKey(primaryId), value: this.encode(primaryId, record), ttlSeconds },
      ...secondaryKeys.map(({ key }) => ({
        key: this.fullKey(key),
        value: encoder.encode(primaryId),
        ttlSeconds,
      })),
    ]
  }

  private encode(id: CacheKey, record: T): Uint8Array {
    const bytes = this.codec.encode(record)

    if (isNegativeMarker(bytes)) {
      throw RecordCacheError.invalidArgument(
        "Encoded record collides with the negative marker",
        { key: id },
      )
    }

    return bytes
  }

  private classify(key: string, raw: RawValue): CacheResult<T> {
    if (raw === null || raw.length === 0) return { kind: "absent" }
    if (isNegativeMarker(raw)) return { kind: "negative" }

    try {
      return { kind: "record", value: this.codec.decode(raw) }
    } catch (cause) {
      throw RecordCacheError.decodeFailed({ key, cause })
    }
  }

  private indexKey(index: string, values: IndexLookup): string {
    const tuple: IndexTuple = isTuple(values) ? values : [values]

    return this.fullKey(this.catalog.keyFor(index, tuple))
  }

  private resolveTtl(ttl: Seconds | undefined): Seconds {
    if (ttl === undefined) return this.config.ttl

    if (!Number.isInteger(ttl) || ttl < 0) {
      throw RecordCacheError.invalidArgument("TTL must be a non-negative integer", { ttl })
    }

    return ttl
  }

  private fullKey(key: CacheKey): string {
    return `${this.config.keyspacePrefix}${key}`
  }
}

function isTuple(values: IndexLookup): values is IndexTuple {
  return Array.isArray(values)
}

function assertId(id: CacheKey): CacheKey {
  if (typeof id !== "string" || id === "") {
    throw RecordCacheError.invalidArgument("Record id must be a non-empty string", { id })
  }

  return id
}

function assertAcked(acked: boolean): true {
  if (!acked) {
    throw BackingStoreProtocolError.unexpectedReply({
      operation: "SET",
      position: 0,
      received: "rejected write",
    })
  }

  return acked
}
