export type IndexDefinition = Readonly<{
  name: string
  fields: readonly string[]
}>

/** Accepted at construction time; a single field may be given as a string. */
export type IndexDefinitionInput = Readonly<{
  name: string
  fields: string | readonly string[]
}>

/** A scalar that can be rendered into a secondary key. */
export type IndexValue = string | number | bigint | boolean

/** Positional values, one per field of the index. */
export type IndexTuple = readonly IndexValue[]
