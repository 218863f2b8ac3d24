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
    it("serializes every field", () => {
      const err = new BaseError("not an integer", {
        code: "not_an_integer",
        context: { key: "ctr" },
        isRetryable: false,
        isOperational: true,
      })

      expect(serializeError(err)).toStrictEqual({
        name: "BaseError",
        code: "not_an_integer",
        message: "not an integer",
        context: { key: "ctr" },
        isRetryable: false,
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("serializes the cause chain", () => {
      const root = new Error("ECONNRESET")
      const middle = new BaseError("layer failed", { code: "layer_failed", cause: root })
      const outer = new BaseError("all layers failed", {
        code: "all_layers_failed",
        cause: middle,
      })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("layer_failed")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("ECONNRESET")
    })

    it("omits stack unless requested", () => {
      const err = new BaseError("x", { code: "x" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("omits cause when there is none", () => {
      const err = new BaseError("x", { code: "x" })

      expect("cause" in serializeError(err)).toBe(false)
    })
  })

  describe("plain errors", () => {
    it("uses code unknown and marks them non-operational", () => {
      const serialized = serializeError(new TypeError("bad argument"))

      expect(serialized).toMatchObject({
        name: "TypeError",
        code: "unknown",
        message: "bad argument",
        isOperational: false,
      })
    })

    it("follows the cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("uses a thrown string as the message", () => {
      const serialized = serializeError("boom")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("boom")
      expect(serialized.context).toStrictEqual({})
    })

    it("wraps other values in context.value", () => {
      const value = { reason: "lease lost" }

      const serialized = serializeError(value)

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toStrictEqual({ value })
    })

    it("handles null", () => {
      expect(serializeError(null).context).toStrictEqual({ value: null })
    })
  })
})
