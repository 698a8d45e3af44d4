import type { Seconds } from "@recache/clock"
import type { ServerScript } from "./server-script"

/** Bytes stored at a key, or `null` when the key does not exist. */
export type RawValue = Uint8Array | null

export type BackingSetOptions = {
  /** Expiry in seconds. `0` or unset stores the key without expiry. */
  ttlSeconds?: Seconds
}

/**
 * One pipeline reply. A queued `set` replies with its acknowledgement, a
 * queued script with the value it returned.
 */
export type PipelineReply = boolean | RawValue

/**
 * Operations queued and sent to the backing store in one round trip.
 *
 * @remarks
 * Replies come back in enqueue order. The pipeline is not a transaction: a
 * dropped connection may leave only some of the queued writes applied.
 */
export interface BackingPipeline {
  set(key: string, value: Uint8Array, opts?: BackingSetOptions): BackingPipeline
  runScript(
    script: ServerScript,
    keys: readonly string[],
    args: readonly string[],
  ): BackingPipeline
  exec(): Promise<PipelineReply[]>
}

/**
 * The subset of the Redis protocol the record cache consumes.
 *
 * Keys passed here are full keys, with any keyspace prefix already applied.
 */
export interface BackingStore {
  get(key: string): Promise<RawValue>
  mGet(keys: readonly string[]): Promise<RawValue[]>
  /** Resolves `true` once the store acknowledged the write. */
  set(key: string, value: Uint8Array, opts?: BackingSetOptions): Promise<boolean>
  runScript(
    script: ServerScript,
    keys: readonly string[],
    args: readonly string[],
  ): Promise<RawValue>
  pipeline(): BackingPipeline
}
