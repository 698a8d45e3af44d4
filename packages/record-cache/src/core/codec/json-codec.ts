import superjson from "superjson"
import type { ZodType } from "zod"
import type { Codec } from "../../ports/codec"

const decoder = new TextDecoder()

/**
 * UTF-8 JSON via superjson, so `Date`, `Map`, `Set` and `bigint` fields
 * survive the round trip. With a schema, decoded values are validated.
 */
export function createJsonCodec<T>(schema?: ZodType<T>): Codec<T> {
  return {
    encode: (value: T) => Buffer.from(superjson.stringify(value), "utf8"),
    decode: (data: Uint8Array) => {
      const text = decoder.decode(data)

      return schema ? schema.parse(superjson.parse<unknown>(text)) : superjson.parse<T>(text)
    },
  }
}
