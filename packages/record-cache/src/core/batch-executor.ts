import type { Seconds } from "@recache/clock"
import type {
  BackingSetOptions,
  BackingStore,
  PipelineReply,
  RawValue,
} from "../ports/backing-store"
import { BackingStoreProtocolError } from "./errors/backing-store-protocol-error"
import type { SecondaryResolver } from "./secondary-resolver"

export type BatchWrite = {
  key: string
  value: Uint8Array
  ttlSeconds: Seconds
}

export type BatchExecutorDeps = {
  store: BackingStore
  resolver: SecondaryResolver
}

/**
 * Sends many operations in one round trip. Keys are full keys; replies come
 * back in input order. Empty batches never reach the store.
 */
export class BatchExecutor {
  constructor(private readonly deps: BatchExecutorDeps) {}

  async getMany(keys: readonly string[]): Promise<RawValue[]> {
    if (keys.length === 0) return []

    const replies = await this.deps.store.mGet(keys)
    assertReplyCount("MGET", keys.length, replies)

    return replies
  }

  async resolveMany(indexKeys: readonly string[]): Promise<RawValue[]> {
    if (indexKeys.length === 0) return []

    const pipeline = this.deps.store.pipeline()
    for (const key of indexKeys) {
      this.deps.resolver.enqueue(pipeline, key)
    }

    const replies = await pipeline.exec()
    assertReplyCount("resolve pipeline", indexKeys.length, replies)

    return replies.map((reply, position) => toRawValue(reply, position))
  }

  /** Resolves once every write was acknowledged. */
  async setMany(writes: readonly BatchWrite[]): Promise<true[]> {
    if (writes.length === 0) return []

    const pipeline = this.deps.store.pipeline()
    for (const write of writes) {
      pipeline.set(write.key, write.value, toSetOptions(write.ttlSeconds))
    }

    const replies = await pipeline.exec()
    assertReplyCount("SET pipeline", writes.length, replies)

    return replies.map((reply, position) => toAck(reply, position))
  }
}

export function toSetOptions(ttlSeconds: Seconds): BackingSetOptions {
  return ttlSeconds > 0 ? { ttlSeconds } : {}
}

function assertReplyCount(operation: string, expected: number, replies: readonly unknown[]) {
  if (replies.length !== expected) {
    throw BackingStoreProtocolError.replyCount({
      operation,
      expected,
      received: replies.length,
    })
  }
}

function toRawValue(reply: PipelineReply, position: number): RawValue {
  if (typeof reply === "boolean") {
    throw BackingStoreProtocolError.unexpectedReply({
      operation: "resolve pipeline",
      position,
      received: "acknowledgement",
    })
  }

  return reply
}

function toAck(reply: PipelineReply, position: number): true {
  if (reply !== true) {
    throw BackingStoreProtocolError.unexpectedReply({
      operation: "SET pipeline",
      position,
      received: reply === false ? "rejected write" : "value",
    })
  }

  return reply
}
