import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("keeps message and code", () => {
      const err = new BaseError("count must not be negative", { code: "invalid_argument" })

      expect(err.message).toBe("count must not be negative")
      expect(err.code).toBe("invalid_argument")
    })

    it("sets name to constructor name", () => {
      class RenderFailure extends BaseError<"render_failed"> {}
      const err = new RenderFailure("boom", { code: "render_failed" })

      expect(err.name).toBe("RenderFailure")
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isOperational).toBe(true)
    })

    it("stamps the creation time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("copies the context so later mutation of the input is not visible", () => {
      const context: Record<string, unknown> = { count: -1 }
      const err = new BaseError("bad count", { code: "invalid_argument", context })

      context.count = 5

      expect(err.context).toEqual({ count: -1 })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("sink closed")
      const err = new BaseError("write failed", { code: "io", cause })

      expect(err.cause).toBe(cause)
    })

    it("accepts isOperational false for invariant violations", () => {
      const err = new BaseError("corrupt", { code: "invariant", isOperational: false })

      expect(err.isOperational).toBe(false)
    })

    it("is an Error with a stack trace", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err).toBeInstanceOf(Error)
      expect(err.stack).toContain("BaseError")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized shape", () => {
      const err = new BaseError("bad count", {
        code: "invalid_argument",
        context: { count: -2 },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "invalid_argument",
        message: "bad count",
        context: { count: -2 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is what JSON.stringify uses", () => {
      const err = new BaseError("bad count", { code: "invalid_argument" })

      const parsed = JSON.parse(JSON.stringify(err))

      expect(parsed.code).toBe("invalid_argument")
      expect(parsed.message).toBe("bad count")
    })
  })
})
