import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))].filter((s) => s !== "default")
  }
}
