import type { RawValue } from "./backing-store"

/** Read access to the keyspace while a script runs. */
export interface ScriptView {
  get(key: string): RawValue
}

/**
 * A script executed atomically by the backing store.
 *
 * @remarks
 * `lua` is what Redis runs through EVAL. `run` renders the same logic in
 * process for stores that hold their data in memory; both must agree on every
 * input.
 */
export type ServerScript = Readonly<{
  name: string
  lua: string
  run(view: ScriptView, keys: readonly string[], args: readonly string[]): RawValue
}>
