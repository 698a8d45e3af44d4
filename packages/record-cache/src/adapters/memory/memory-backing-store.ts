import { type Clock, type Milliseconds, SystemClock, secondsToMs } from "@recache/clock"
import type {
  BackingPipeline,
  BackingSetOptions,
  BackingStore,
  PipelineReply,
  RawValue,
} from "../../ports/backing-store"
import type { ServerScript } from "../../ports/server-script"

export type MemoryBackingStoreDeps = {
  clock: Clock
}

export type MemoryBackingEntry = {
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

/**
 * An in-process backing store with Redis expiry semantics.
 *
 * @remarks
 * Scripts and pipelines run in one synchronous step, so no other operation
 * interleaves with them.
 */
export class MemoryBackingStore implements BackingStore {
  private readonly entries = new Map<string, MemoryBackingEntry>()

  constructor(private readonly deps: MemoryBackingStoreDeps = { clock: new SystemClock() }) {}

  async get(key: string): Promise<RawValue> {
    return this.read(key)
  }

  async mGet(keys: readonly string[]): Promise<RawValue[]> {
    return keys.map((key) => this.read(key))
  }

  async set(key: string, value: Uint8Array, opts?: BackingSetOptions): Promise<boolean> {
    return this.write(key, value, opts)
  }

  async runScript(
    script: ServerScript,
    keys: readonly string[],
    args: readonly string[],
  ): Promise<RawValue> {
    return this.evaluate(script, keys, args)
  }

  pipeline(): BackingPipeline {
    const queued: (() => PipelineReply)[] = []

    const pipeline: BackingPipeline = {
      set: (key, value, opts) => {
        queued.push(() => this.write(key, value, opts))
        return pipeline
      },
      runScript: (script, keys, args) => {
        queued.push(() => this.evaluate(script, keys, args))
        return pipeline
      },
      exec: async () => queued.map((run) => run()),
    }

    return pipeline
  }

  /** Number of live keys. Expired keys are dropped first. */
  get size(): number {
    for (const key of [...this.entries.keys()]) {
      this.read(key)
    }

    return this.entries.size
  }

  private evaluate(
    script: ServerScript,
    keys: readonly string[],
    args: readonly string[],
  ): RawValue {
    return script.run({ get: (key) => this.read(key) }, keys, args)
  }

  private read(key: string): RawValue {
    const entry = this.entries.get(key)
    if (entry === undefined) return null

    if (entry.expiresAtMs !== undefined && entry.expiresAtMs <= this.deps.clock.nowMs()) {
      this.entries.delete(key)
      return null
    }

    return entry.value.slice()
  }

  private write(key: string, value: Uint8Array, opts?: BackingSetOptions): true {
    const ttlSeconds = opts?.ttlSeconds ?? 0
    const copy = new Uint8Array(value)

    if (ttlSeconds > 0) {
      this.entries.set(key, {
        value: copy,
        expiresAtMs: this.deps.clock.nowMs() + secondsToMs(ttlSeconds),
      })
    } else {
      this.entries.set(key, { value: copy })
    }

    return true
  }
}
