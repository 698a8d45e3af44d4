import { EnvSource, loadConfig, ObjectSource } from "@recache/config"
import { logLevelNames, type LoggerOptions } from "@recache/logger"
import { z } from "zod"
import type { RecordCacheConfigInput } from "../../ports/record-cache-config"

export const recordCacheEnvSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("recache"),

  RECORD_CACHE_TTL: z.coerce.number().int().nonnegative().default(0),
  RECORD_CACHE_KEY_PREFIX: z.string().default(""),

  REDIS_HOST: z.string().min(1).default("localhost"),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_DB: z.coerce.number().int().nonnegative().default(0),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type RecordCacheEnv = z.infer<typeof recordCacheEnvSchema>

export type RecordCacheEnvConfig = {
  app: { env: string; service: string }
  cache: RecordCacheConfigInput
  logging: LoggerOptions
}

export type LoadedRecordCacheEnv = RecordCacheEnvConfig & {
  /** Sources that provided at least one value, e.g. `["env"]`. */
  sources: string[]
}

export function mapEnvToConfig(env: RecordCacheEnv): RecordCacheEnvConfig {
  return {
    app: { env: env.APP_ENV, service: env.SERVICE_NAME },
    cache: {
      ttl: env.RECORD_CACHE_TTL,
      keyspacePrefix: env.RECORD_CACHE_KEY_PREFIX,
      server: { host: env.REDIS_HOST, port: env.REDIS_PORT, db: env.REDIS_DB },
    },
    logging: { level: env.LOG_LEVEL, prettify: env.LOG_PRETTY },
  }
}

/**
 * Reads cache, connection and logging settings from the environment.
 * Indexes are not part of it: they belong with the code that defines records.
 */
export async function loadRecordCacheEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: Record<string, unknown> = {},
): Promise<LoadedRecordCacheEnv> {
  const config = await loadConfig({
    schema: recordCacheEnvSchema,
    sources: [new EnvSource({ env }), new ObjectSource(overrides)],
  })

  return { ...mapEnvToConfig(config.value), sources: config.sourcesUsed() }
}
