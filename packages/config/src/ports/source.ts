/**
 * Where raw configuration values come from. Sources only load; the schema
 * given to `loadConfig` coerces and validates.
 *
 * Sources are merged in order and later ones win. `name` is what
 * `Config.sourcesUsed` reports for a source that provided a value.
 */
export interface ConfigSource {
  readonly name: string

  /** A key mapped to `undefined` is treated as not provided. */
  load(): Promise<Record<string, unknown>>
}
