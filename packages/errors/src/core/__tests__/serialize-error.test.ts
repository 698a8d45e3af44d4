import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("test error", {
        code: "test",
        context: { key: "123" },
        isRetryable: true,
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "test",
        message: "test error",
        context: { key: "123" },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("omits stack by default and includes it when requested", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("serializes cause chain recursively", () => {
      const root = new Error("root cause")
      const middle = new BaseError("middle", { code: "mid", cause: root })
      const outer = new BaseError("outer", { code: "outer", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("mid")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("root cause")
    })

    it("omits cause property when undefined", () => {
      const err = new BaseError("no cause", { code: "test" })

      expect("cause" in serializeError(err)).toBe(false)
    })
  })

  describe("standard Error instances", () => {
    it("marks them non-operational with code unknown", () => {
      const serialized = serializeError(new TypeError("bad input"))

      expect(serialized).toEqual({
        name: "TypeError",
        code: "unknown",
        message: "bad input",
        context: {},
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })

  describe("non-Error values", () => {
    it("uses a thrown string as the message", () => {
      const serialized = serializeError("boom")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("boom")
      expect(serialized.context).toEqual({ value: "boom" })
    })

    it("keeps other thrown values in context", () => {
      const serialized = serializeError({ reason: 42 })

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value: { reason: 42 } })
    })
  })
})
