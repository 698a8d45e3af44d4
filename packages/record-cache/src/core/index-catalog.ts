import type { CacheKey } from "../ports/cache-key"
import type {
  IndexDefinition,
  IndexDefinitionInput,
  IndexTuple,
} from "../ports/index-definition"
import { RecordCacheError } from "./errors/record-cache-error"

export const KEY_SEPARATOR = ":"

export type IndexKey = {
  index: string
  key: CacheKey
}

/**
 * The secondary indexes of one cache, and the keys they produce.
 *
 * @remarks
 * A secondary key is `<name>:<v1>:<v2>...` in field order. Values may not
 * contain the separator, so two different tuples never render the same key.
 */
export class IndexCatalog {
  private readonly definitions: ReadonlyMap<string, IndexDefinition>

  constructor(definitions: readonly IndexDefinitionInput[] = []) {
    const byName = new Map<string, IndexDefinition>()

    for (const [position, input] of definitions.entries()) {
      const definition = normalize(input, position)

      if (byName.has(definition.name)) {
        throw RecordCacheError.configuration({
          path: `conf.indexes[${position}].name`,
          message: `duplicate index name "${definition.name}"`,
        })
      }

      byName.set(definition.name, definition)
    }

    this.definitions = byName
  }

  get size(): number {
    return this.definitions.size
  }

  get isEmpty(): boolean {
    return this.definitions.size === 0
  }

  has(name: string): boolean {
    return this.definitions.has(name)
  }

  get(name: string): IndexDefinition {
    if (name === "") {
      throw RecordCacheError.invalidArgument("Index name must be a non-empty string")
    }

    const definition = this.definitions.get(name)
    if (definition === undefined) {
      throw RecordCacheError.unknownIndex({ index: name, known: this.names() })
    }

    return definition
  }

  names(): string[] {
    return [...this.definitions.keys()]
  }

  keyFor(name: string, values: IndexTuple): CacheKey {
    const definition = this.get(name)

    if (values.length !== definition.fields.length) {
      throw RecordCacheError.invalidArgument(
        `Index "${name}" takes ${definition.fields.length} value(s), received ${values.length}`,
        { index: name, expected: definition.fields.length, received: values.length },
      )
    }

    const parts = definition.fields.map((field, i) => renderValue(name, field, values[i]))

    return [name, ...parts].join(KEY_SEPARATOR)
  }

  keyForRecord(name: string, record: object): CacheKey {
    const definition = this.get(name)
    const parts = definition.fields.map((field) =>
      renderValue(name, field, Reflect.get(record, field)),
    )

    return [name, ...parts].join(KEY_SEPARATOR)
  }

  /** One secondary key per configured index, in configuration order. */
  keysForRecord(record: object): IndexKey[] {
    return this.names().map((index) => ({ index, key: this.keyForRecord(index, record) }))
  }
}

function normalize(input: IndexDefinitionInput, position: number): IndexDefinition {
  if (input.name === "") {
    throw RecordCacheError.configuration({
      path: `conf.indexes[${position}].name`,
      message: "index name must be a non-empty string",
    })
  }

  const fields = typeof input.fields === "string" ? [input.fields] : [...input.fields]

  if (fields.length === 0 || fields.some((field) => field === "")) {
    throw RecordCacheError.configuration({
      path: `conf.indexes[${position}].fields`,
      message: "fields must be a non-empty string or a non-empty list of them",
    })
  }

  return { name: input.name, fields }
}

function renderValue(index: string, field: string, value: unknown): string {
  const rendered = toKeyPart(value)

  if (rendered === undefined) {
    throw RecordCacheError.invalidArgument(
      `Index "${index}" field "${field}" must be a non-empty string or a finite scalar`,
      { index, field },
    )
  }

  if (rendered.includes(KEY_SEPARATOR)) {
    throw RecordCacheError.invalidArgument(
      `Index "${index}" field "${field}" must not contain "${KEY_SEPARATOR}"`,
      { index, field },
    )
  }

  return rendered
}

function toKeyPart(value: unknown): string | undefined {
  switch (typeof value) {
    case "string":
      return value === "" ? undefined : value
    case "number":
      return Number.isFinite(value) ? String(value) : undefined
    case "bigint":
    case "boolean":
      return String(value)
    default:
      return undefined
  }
}
