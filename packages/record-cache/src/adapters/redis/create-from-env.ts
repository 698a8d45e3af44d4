import { createPinoLogger, type PinoLoggerDeps } from "@recache/logger"
import { loadRecordCacheEnv } from "../../core/config/load-record-cache-env"
import type { Connect, ConnectionRegistry } from "../../core/connection-registry"
import type { RecordCacheStore } from "../../core/record-cache-store"
import type { Codec } from "../../ports/codec"
import type { IndexDefinitionInput } from "../../ports/index-definition"
import { createRecordCache } from "./create"
import type { RedisBytesClient } from "./redis-client"

export type CreateRecordCacheFromEnvOptions<T> = {
  codec: Codec<T>
  indexes?: readonly IndexDefinitionInput[]
  registry: ConnectionRegistry<RedisBytesClient>
  env?: Record<string, string | undefined>
  overrides?: Record<string, unknown>
  connect?: Connect<RedisBytesClient>
  /** Where JSON log lines go. Defaults to stdout. */
  destination?: PinoLoggerDeps["destination"]
}

/**
 * Wires a cache from `RECORD_CACHE_*`, `REDIS_*` and `LOG_*` variables, with
 * a pino logger tagged by service and environment.
 */
export async function createRecordCacheFromEnv<T extends object>(
  options: CreateRecordCacheFromEnvOptions<T>,
): Promise<RecordCacheStore<T>> {
  const settings = await loadRecordCacheEnv(options.env, options.overrides)

  const logger = createPinoLogger(
    options.destination !== undefined ? { destination: options.destination } : {},
    settings.logging,
    { service: settings.app.service, env: settings.app.env },
  )

  const cache = await createRecordCache<T>({
    config: { ...settings.cache, indexes: options.indexes ?? [] },
    codec: options.codec,
    registry: options.registry,
    logger,
    ...(options.connect !== undefined && { connect: options.connect }),
  })

  logger.info("Record cache ready", {
    cache: settings.cache.keyspacePrefix ?? "",
    indexes: cache.catalog.names(),
    sources: settings.sources,
  })

  return cache
}
