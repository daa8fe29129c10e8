import { catchError } from "../../../tests/catch-error"
import { InvalidConventionDefinitionError } from "../../errors/errors"
import { defineConvention, sameDefinition } from "../define-convention"

const input = {
  uuid: "AAAAAAAA-1111-2222-3333-BBBBBBBBBBBB",
  schemaUrl: "https://example.com/schemas/sample.json",
  specUrl: "https://example.com/specs/sample",
  name: "sample",
  description: "Sample convention.",
}

describe("defineConvention", () => {
  it("lowercases the uuid and freezes the result", () => {
    const def = defineConvention(input)

    expect(def).toEqual({ ...input, uuid: "aaaaaaaa-1111-2222-3333-bbbbbbbbbbbb" })
    expect(Object.isFrozen(def)).toBe(true)
  })

  it.each([
    ["uuid", { uuid: "not-a-uuid" }],
    ["schemaUrl", { schemaUrl: "schemas/sample.json" }],
    ["specUrl", { specUrl: "" }],
    ["name", { name: "" }],
  ])("rejects an invalid %s", (field, patch) => {
    const err = catchError(() => defineConvention({ ...input, ...patch }))

    expect(err).toBeInstanceOf(InvalidConventionDefinitionError)
    expect(err).toMatchObject({
      code: "invalid_convention_definition",
      context: { issues: [expect.objectContaining({ path: field })] },
    })
  })
})

describe("sameDefinition", () => {
  it("compares every field", () => {
    const a = defineConvention(input)

    expect(sameDefinition(a, defineConvention(input))).toBe(true)
    expect(sameDefinition(a, defineConvention({ ...input, description: "Other." }))).toBe(false)
  })
})
