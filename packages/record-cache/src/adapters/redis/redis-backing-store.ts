import { BackingStoreProtocolError } from "../../core/errors/backing-store-protocol-error"
import type {
  BackingPipeline,
  BackingSetOptions,
  BackingStore,
  PipelineReply,
  RawValue,
} from "../../ports/backing-store"
import type { ServerScript } from "../../ports/server-script"
import type { RedisBytesClient, RedisBytesMulti, RedisSetOptions } from "./redis-client"

type QueuedKind = "set" | "script"

export class RedisBackingStore implements BackingStore {
  public constructor(private readonly client: RedisBytesClient) {}

  async get(key: string): Promise<RawValue> {
    const buffer = await this.client.get(key)

    return toRawValue(buffer, "GET", 0)
  }

  async mGet(keys: readonly string[]): Promise<RawValue[]> {
    if (keys.length === 0) return []

    const buffers = await this.client.mGet(keys)

    return buffers.map((buffer, i) => toRawValue(buffer, "MGET", i))
  }

  async set(key: string, value: Uint8Array, opts?: BackingSetOptions): Promise<boolean> {
    const ttl = toRedisTtl(opts)
    const reply = ttl
      ? await this.client.set(key, Buffer.from(value), ttl)
      : await this.client.set(key, Buffer.from(value))

    return reply === "OK"
  }

  async runScript(
    script: ServerScript,
    keys: readonly string[],
    args: readonly string[],
  ): Promise<RawValue> {
    const reply = await this.client.eval(script.lua, {
      keys: [...keys],
      arguments: [...args],
    })

    return toRawValue(reply, `EVAL ${script.name}`, 0)
  }

  pipeline(): BackingPipeline {
    return new RedisBackingPipeline(this.client.multi())
  }
}

class RedisBackingPipeline implements BackingPipeline {
  private readonly queued: QueuedKind[] = []

  constructor(private readonly multi: RedisBytesMulti) {}

  set(key: string, value: Uint8Array, opts?: BackingSetOptions): BackingPipeline {
    const ttl = toRedisTtl(opts)
    if (ttl) this.multi.set(key, Buffer.from(value), ttl)
    else this.multi.set(key, Buffer.from(value))

    this.queued.push("set")
    return this
  }

  runScript(
    script: ServerScript,
    keys: readonly string[],
    args: readonly string[],
  ): BackingPipeline {
    this.multi.eval(script.lua, { keys: [...keys], arguments: [...args] })

    this.queued.push("script")
    return this
  }

  async exec(): Promise<PipelineReply[]> {
    if (this.queued.length === 0) return []

    const replies = await this.multi.execAsPipeline()

    return replies.map((reply, i) =>
      this.queued[i] === "set" ? reply === "OK" : toRawValue(reply, "pipeline", i),
    )
  }
}

function toRedisTtl(opts: BackingSetOptions | undefined): RedisSetOptions | undefined {
  const ttlSeconds = opts?.ttlSeconds ?? 0

  return ttlSeconds > 0 ? { EX: ttlSeconds } : undefined
}

function toRawValue(reply: unknown, operation: string, position: number): RawValue {
  if (reply === null || reply === undefined) return null
  if (reply instanceof Uint8Array) return new Uint8Array(reply)
  if (typeof reply === "string") return new Uint8Array(Buffer.from(reply, "utf8"))

  throw BackingStoreProtocolError.unexpectedReply({
    operation,
    position,
    received: typeof reply,
  })
}
