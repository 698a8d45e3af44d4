export { createMemoryRecordCache, type CreateMemoryRecordCacheOptions } from "./adapters/memory/create"
export {
  type MemoryBackingEntry,
  MemoryBackingStore,
  type MemoryBackingStoreDeps,
} from "./adapters/memory/memory-backing-store"
export { createRecordCache, type CreateRecordCacheOptions } from "./adapters/redis/create"
export {
  createRecordCacheFromEnv,
  type CreateRecordCacheFromEnvOptions,
} from "./adapters/redis/create-from-env"
export { RedisBackingStore } from "./adapters/redis/redis-backing-store"
export {
  connectRedisBytesClient,
  createRedisBytesClient,
  type RedisBytesClient,
  type RedisBytesMulti,
} from "./adapters/redis/redis-client"
export { BatchExecutor, type BatchWrite } from "./core/batch-executor"
export { createJsonCodec } from "./core/codec/json-codec"
export {
  type LoadedRecordCacheEnv,
  loadRecordCacheEnv,
  mapEnvToConfig,
  type RecordCacheEnv,
  type RecordCacheEnvConfig,
  recordCacheEnvSchema,
} from "./core/config/load-record-cache-env"
export { parseRecordCacheConfig, recordCacheConfigSchema } from "./core/config/record-cache-config"
export { type Connect, ConnectionRegistry, type ConnectionRegistryDeps } from "./core/connection-registry"
export { BackingStoreProtocolError } from "./core/errors/backing-store-protocol-error"
export { RecordCacheError, type RecordCacheErrorCode } from "./core/errors/record-cache-error"
export { IndexCatalog, type IndexKey, KEY_SEPARATOR } from "./core/index-catalog"
export { isNegativeMarker, NEGATIVE_MARKER } from "./core/negative-marker"
export { RecordCacheStore, type RecordCacheStoreDeps } from "./core/record-cache-store"
export { RESOLVE_SECONDARY_SCRIPT, SecondaryResolver } from "./core/secondary-resolver"
export type {
  BackingPipeline,
  BackingSetOptions,
  BackingStore,
  PipelineReply,
  RawValue,
} from "./ports/backing-store"
export type { CacheEntry } from "./ports/cache-entry"
export type { CacheKey } from "./ports/cache-key"
export type { AbsentResult, CachedRecord, CacheResult, NegativeResult } from "./ports/cache-result"
export type { Codec } from "./ports/codec"
export type {
  IndexDefinition,
  IndexDefinitionInput,
  IndexTuple,
  IndexValue,
} from "./ports/index-definition"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
export type { IndexLookup, RecordCache } from "./ports/record-cache"
export type { RecordCacheConfig, RecordCacheConfigInput } from "./ports/record-cache-config"
export type { ScriptView, ServerScript } from "./ports/server-script"
export { type ServerIdentity, serverIdentityKey } from "./ports/server-identity"
