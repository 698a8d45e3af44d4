import { createNullLogger, type Logger } from "@recache/logger"
import { parseRecordCacheConfig } from "../../core/config/record-cache-config"
import type { Connect, ConnectionRegistry } from "../../core/connection-registry"
import { RecordCacheStore } from "../../core/record-cache-store"
import type { Codec } from "../../ports/codec"
import type { RecordCacheConfigInput } from "../../ports/record-cache-config"
import { serverIdentityKey } from "../../ports/server-identity"
import { RedisBackingStore } from "./redis-backing-store"
import { connectRedisBytesClient, type RedisBytesClient } from "./redis-client"

export type CreateRecordCacheOptions<T> = {
  config: RecordCacheConfigInput
  codec: Codec<T>
  /** Caches built from one registry share a connection per server identity. */
  registry: ConnectionRegistry<RedisBytesClient>
  logger?: Logger
  connect?: Connect<RedisBytesClient>
}

/**
 * Validates the configuration, then reuses or opens the connection for
 * `config.server`.
 */
export async function createRecordCache<T extends object>(
  options: CreateRecordCacheOptions<T>,
): Promise<RecordCacheStore<T>> {
  const config = parseRecordCacheConfig(options.config)
  const logger = (options.logger ?? createNullLogger()).child({
    server: serverIdentityKey(config.server),
  })

  const client = await options.registry.getOrCreate(
    config.server,
    options.connect ?? connectRedisBytesClient,
  )

  return new RecordCacheStore(
    { backend: new RedisBackingStore(client), codec: options.codec, logger },
    config,
  )
}
