import { BaseError } from "../base-error"

class KeyTakenError extends BaseError<"key_taken"> {
  constructor(key: string) {
    super(`Key ${key} is taken`, { code: "key_taken", context: { key } })
  }
}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("carries message and code", () => {
      const err = new BaseError("backend unavailable", { code: "backend_unavailable" })

      expect(err.message).toBe("backend unavailable")
      expect(err.code).toBe("backend_unavailable")
    })

    it("uses the subclass name", () => {
      const err = new KeyTakenError("user:1")

      expect(err.name).toBe("KeyTakenError")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
    })

    it("applies defaults", () => {
      const err = new BaseError("x", { code: "x" })

      expect(err.context).toStrictEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toStrictEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("keeps explicit flags and cause", () => {
      const cause = new Error("socket closed")
      const err = new BaseError("timed out", {
        code: "cache_timeout",
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes a copy of the context", () => {
      const context = { key: "user:1" }
      const err = new BaseError("x", { code: "x", context })

      context.key = "user:2"

      expect(err.context).toStrictEqual({ key: "user:1" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("has a stack trace naming the error", () => {
      const err = new KeyTakenError("user:1")

      expect(err.stack).toContain("KeyTakenError")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized form", () => {
      const err = new KeyTakenError("user:1")

      expect(err.toJSON()).toStrictEqual({
        name: "KeyTakenError",
        code: "key_taken",
        message: "Key user:1 is taken",
        context: { key: "user:1" },
        isRetryable: false,
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is what JSON.stringify emits", () => {
      const err = new KeyTakenError("user:1")

      expect(JSON.parse(JSON.stringify(err))).toStrictEqual(err.toJSON())
    })
  })
})
