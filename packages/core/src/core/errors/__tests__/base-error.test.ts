import { ConventionError, serializeError } from "../base-error"

describe("ConventionError", () => {
  it("carries code, frozen context and defaults", () => {
    const err = new ConventionError("boom", { code: "test_code", context: { key: "a" } })

    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe("ConventionError")
    expect(err.code).toBe("test_code")
    expect(err.context).toEqual({ key: "a" })
    expect(Object.isFrozen(err.context)).toBe(true)
    expect(err.isOperational).toBe(true)
    expect(err.timestamp).toBeInstanceOf(Date)
  })

  it("copies context so later mutation of the input has no effect", () => {
    const context: Record<string, unknown> = { key: "a" }
    const err = new ConventionError("boom", { code: "test_code", context })
    context.key = "b"

    expect(err.context.key).toBe("a")
  })

  it("keeps the cause", () => {
    const cause = new Error("inner")
    const err = new ConventionError("outer", { code: "test_code", cause })

    expect(err.cause).toBe(cause)
  })

  it("toJSON serializes through serializeError", () => {
    const err = new ConventionError("boom", { code: "test_code", context: { index: 2 } })
    const json = err.toJSON()

    expect(json).toEqual({
      name: "ConventionError",
      code: "test_code",
      message: "boom",
      context: { index: 2 },
      isOperational: true,
      timestamp: err.timestamp.toISOString(),
    })
  })
})

describe("serializeError", () => {
  it("serializes nested causes", () => {
    const err = new ConventionError("outer", {
      code: "test_code",
      cause: new TypeError("inner"),
    })

    const json = serializeError(err)

    expect(json.cause?.name).toBe("TypeError")
    expect(json.cause?.code).toBe("unknown")
    expect(json.cause?.message).toBe("inner")
    expect(json.cause?.isOperational).toBe(false)
  })

  it("omits the stack unless asked", () => {
    const err = new ConventionError("boom", { code: "test_code" })

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toContain("boom")
  })

  it("wraps non-Error values", () => {
    expect(serializeError("plain")).toMatchObject({
      name: "NonErrorThrown",
      code: "unknown",
      message: "plain",
      context: { value: "plain" },
    })
    expect(serializeError(42).message).toBe("Unknown error")
  })

  it("survives JSON.stringify", () => {
    const err = new ConventionError("boom", { code: "test_code", context: { key: "k" } })
    const parsed: unknown = JSON.parse(JSON.stringify({ error: err }))

    expect(parsed).toMatchObject({ error: { code: "test_code", message: "boom" } })
  })
})
