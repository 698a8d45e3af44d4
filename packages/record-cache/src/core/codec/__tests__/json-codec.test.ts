import { z } from "zod"
import { createJsonCodec } from "../json-codec"

type Session = {
  id: string
  startedAt: Date
  scopes: Set<string>
  quota: bigint
}

describe("createJsonCodec", () => {
  it("keeps Date, Set and bigint fields", () => {
    const codec = createJsonCodec<Session>()
    const session: Session = {
      id: "s1",
      startedAt: new Date("2024-01-02T03:04:05.000Z"),
      scopes: new Set(["read", "write"]),
      quota: 10n,
    }

    const decoded = codec.decode(codec.encode(session))

    expect(decoded).toStrictEqual(session)
    expect(decoded.startedAt).toBeInstanceOf(Date)
  })

  it("never encodes a value as the bare negative marker", () => {
    const codec = createJsonCodec<number>()

    expect(new TextDecoder().decode(codec.encode(0))).not.toBe("0")
  })

  it("validates decoded values with a schema", () => {
    const codec = createJsonCodec(z.object({ id: z.string() }))
    const encoded = createJsonCodec<{ id: number }>().encode({ id: 7 })

    expect(() => codec.decode(encoded)).toThrow(z.ZodError)
  })

  it("throws on bytes that are not JSON", () => {
    const codec = createJsonCodec<{ id: string }>()

    expect(() => codec.decode(new TextEncoder().encode("not json"))).toThrow(SyntaxError)
  })
})
