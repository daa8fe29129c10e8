import { catchError } from "../../../tests/catch-error"
import { EncodeError } from "../../errors/errors"
import { isJsonObject, toJsonObject, toJsonValue } from "../json"

describe("isJsonObject", () => {
  it("accepts plain objects only", () => {
    expect(isJsonObject({})).toBe(true)
    expect(isJsonObject(Object.create(null))).toBe(true)
    expect(isJsonObject([])).toBe(false)
    expect(isJsonObject(null)).toBe(false)
    expect(isJsonObject("x")).toBe(false)
    expect(isJsonObject(new Date())).toBe(false)
  })
})

describe("toJsonValue", () => {
  it("deep-copies JSON values", () => {
    const input = { a: [1, "two", { b: null }], c: true }
    const out = toJsonValue(input)

    expect(out).toEqual(input)
    expect(out).not.toBe(input)
  })

  it("drops undefined object properties", () => {
    expect(toJsonValue({ a: 1, b: undefined, c: { d: undefined } })).toEqual({ a: 1, c: {} })
  })

  it("rejects non-finite numbers with the path", () => {
    expect(() => toJsonValue({ a: [0, Number.NaN] })).toThrow("Non-finite number at a[1]")
  })

  it.each([
    ["function", () => 1],
    ["symbol", Symbol("s")],
    ["bigint", 1n],
    ["undefined", undefined],
    ["class instance", new Map()],
  ])("rejects a top-level %s", (_label, value) => {
    expect(() => toJsonValue(value)).toThrow(EncodeError)
  })

  it("rejects circular references with the path", () => {
    const node: { name: string; self?: unknown } = { name: "n" }
    node.self = { child: node }

    const err = catchError(() => toJsonValue(node))

    expect(err).toBeInstanceOf(EncodeError)
    expect(err).toHaveProperty("message", "Circular reference at self.child")
    expect(err).toMatchObject({ context: { path: "self.child" } })
  })

  it("rejects an array that contains itself", () => {
    const list: unknown[] = [1]
    list.push(list)

    expect(() => toJsonValue(list)).toThrow("Circular reference at [1]")
  })

  it("copies a shared value at each place it appears", () => {
    const shared = { v: 1 }

    expect(toJsonValue({ a: shared, b: [shared] })).toEqual({ a: { v: 1 }, b: [{ v: 1 }] })
  })

  it("names nested paths of unsupported values", () => {
    const err = catchError(() => toJsonValue({ outer: { inner: [new Date()] } }))

    expect(err).toBeInstanceOf(EncodeError)
    expect(err).toMatchObject({ context: { path: "outer.inner[0]", type: "object" } })
  })
})

describe("toJsonObject", () => {
  it("returns objects", () => {
    expect(toJsonObject({ a: 1 })).toEqual({ a: 1 })
  })

  it("keeps a __proto__ key as data", () => {
    const out = toJsonObject(JSON.parse('{"__proto__":{"x":1},"y":2}'))

    expect(Object.keys(out)).toEqual(["__proto__", "y"])
    expect(Object.getOwnPropertyDescriptor(out, "__proto__")?.value).toEqual({ x: 1 })
    expect(Object.getPrototypeOf(out)).toBe(Object.prototype)
  })

  it.each([
    ["array", [1], "array"],
    ["null", null, "null"],
    ["string", "x", "string"],
  ])("rejects %s", (_label, value, type) => {
    const err = catchError(() => toJsonObject(value))

    expect(err).toBeInstanceOf(EncodeError)
    expect(err).toMatchObject({ context: { type } })
  })
})
