import type { BackingPipeline, BackingStore, RawValue } from "../ports/backing-store"
import type { KeyspacePrefix } from "../ports/keyspace-prefix"
import type { ServerScript } from "../ports/server-script"
import { NEGATIVE_MARKER } from "./negative-marker"

const decoder = new TextDecoder()

/**
 * Reads the primary id stored at KEYS[1] and returns the record stored under
 * ARGV[1] .. id. A negative marker at the index key is returned as is.
 */
export const RESOLVE_SECONDARY_SCRIPT: ServerScript = {
  name: "resolve-secondary",
  lua: `local primary = redis.call('GET', KEYS[1])
if not primary then
  return nil
end
if primary == ARGV[2] then
  return primary
end
return redis.call('GET', ARGV[1] .. primary)
`,
  run(view, keys, args) {
    const [indexKey] = keys
    const [prefix = "", marker = NEGATIVE_MARKER] = args
    if (indexKey === undefined) return null

    const primary = view.get(indexKey)
    if (primary === null) return null

    const primaryId = decoder.decode(primary)
    if (primaryId === marker) return primary

    return view.get(`${prefix}${primaryId}`)
  },
}

export class SecondaryResolver {
  constructor(
    private readonly store: BackingStore,
    private readonly keyspacePrefix: KeyspacePrefix,
  ) {}

  /** `indexKey` is the full key, prefix included. */
  resolve(indexKey: string): Promise<RawValue> {
    return this.store.runScript(RESOLVE_SECONDARY_SCRIPT, [indexKey], this.args())
  }

  enqueue(pipeline: BackingPipeline, indexKey: string): BackingPipeline {
    return pipeline.runScript(RESOLVE_SECONDARY_SCRIPT, [indexKey], this.args())
  }

  private args(): string[] {
    return [this.keyspacePrefix, NEGATIVE_MARKER]
  }
}
