import { type Clock, SystemClock } from "@recache/clock"
import type { Logger } from "@recache/logger"
import { parseRecordCacheConfig } from "../../core/config/record-cache-config"
import { RecordCacheStore } from "../../core/record-cache-store"
import type { Codec } from "../../ports/codec"
import type { RecordCacheConfigInput } from "../../ports/record-cache-config"
import { MemoryBackingStore } from "./memory-backing-store"

export type CreateMemoryRecordCacheOptions<T> = {
  config: RecordCacheConfigInput
  codec: Codec<T>
  /** Share one store between caches to model caches on the same server. */
  store?: MemoryBackingStore
  clock?: Clock
  logger?: Logger
}

export function createMemoryRecordCache<T extends object>(
  options: CreateMemoryRecordCacheOptions<T>,
): RecordCacheStore<T> {
  const config = parseRecordCacheConfig(options.config)
  const backend =
    options.store ?? new MemoryBackingStore({ clock: options.clock ?? new SystemClock() })

  return new RecordCacheStore(
    {
      backend,
      codec: options.codec,
      ...(options.logger !== undefined && { logger: options.logger }),
    },
    config,
  )
}
