import type { ConfigSource } from "../../ports/source"

/**
 * Values supplied in code, e.g. by tests or by a caller that already parsed
 * its own settings. Reported in provenance as `object:<label>`.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Readonly<Record<string, unknown>>,
    label = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
