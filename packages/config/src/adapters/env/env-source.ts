import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with this prefix are loaded, with the prefix stripped. */
  prefix?: string
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Reads process environment variables. A variable set to an empty or
 * whitespace-only string counts as unset, so schema defaults still apply to
 * `REDIS_HOST=` lines left blank in an env file.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix)) continue
      if (value === undefined || value.trim() === "") continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
