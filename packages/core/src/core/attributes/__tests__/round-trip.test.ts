import { canBeEither, either, mustBeNested, mustBePrefixed } from "../../../tests/conventions"
import { AttributesBuilder } from "../attributes-builder"
import { AttributesParser } from "../attributes-parser"

describe("build then parse", () => {
  it("returns nested values unchanged", () => {
    const attrs = new AttributesBuilder()
      .addNested(mustBeNested, { a: 1, b: 2 })
      .addNested(canBeEither, { foo: 3, bar: 4 })
      .build()
    const parser = new AttributesParser(attrs)

    expect(parser.parseNested(mustBeNested)).toEqual({ a: 1, b: 2 })
    expect(parser.parseNested(canBeEither)).toEqual({ foo: 3, bar: 4 })
    expect(parser.parse(canBeEither)).toEqual({ foo: 3, bar: 4 })
    expect(parser.parsePrefixed(canBeEither)).toBeUndefined()
  })

  it("returns prefixed values unchanged", () => {
    const attrs = new AttributesBuilder()
      .addPrefixed(mustBePrefixed, { x: -1.5, y: 0 })
      .addPrefixed(either, { alice: "bob", charlie: "dan" })
      .build()
    const parser = new AttributesParser(attrs)

    expect(parser.parsePrefixed(mustBePrefixed)).toEqual({ x: -1.5, y: 0 })
    expect(parser.parse(either)).toEqual({ alice: "bob", charlie: "dan" })
    expect(parser.parseNested(either)).toBeUndefined()
  })

  it("survives JSON serialization", () => {
    const attrs = new AttributesBuilder()
      .addNested(either, { charlie: "dan" })
      .addAttribute("units", "m")
      .build()
    const parser = AttributesParser.fromJson(JSON.parse(JSON.stringify(attrs)))

    expect(parser.parse(either)).toEqual({ charlie: "dan" })
    expect(parser.get("units")).toBe("m")
    expect(parser.inUse(either)).toBe(true)
    expect(parser.inUse(mustBeNested)).toBe(false)
  })

  it("reads nothing back from an empty document", () => {
    const parser = new AttributesParser(new AttributesBuilder().build())

    for (const type of [mustBeNested, mustBePrefixed, canBeEither]) {
      expect(parser.parse<unknown>(type)).toBeUndefined()
    }
    expect(parser.parseNested(canBeEither)).toBeUndefined()
    expect(parser.parsePrefixed(canBeEither)).toBeUndefined()
  })
})
