import { z } from "zod"
import { catchError } from "../../../tests/catch-error"
import { defineConvention } from "../../../core/convention/define-convention"
import { DecodeMismatchError, EncodeError } from "../../../core/errors/errors"
import { zodConvention } from "../zod-convention"

const Scale = zodConvention({
  definition: defineConvention({
    uuid: "77777777-7777-7777-7777-777777777777",
    schemaUrl: "https://example.com/schema/scale.json",
    specUrl: "https://example.com/spec/scale",
    name: "scale",
    description: "Per-axis scale factors.",
  }),
  schema: z.object({
    factors: z.array(z.number().positive()),
    unit: z.string().optional(),
  }),
  layouts: { nested: { key: "scale" }, prefixed: { prefix: "scale:" } },
})

describe("zodConvention", () => {
  it("keeps the definition and layouts", () => {
    expect(Scale.definition.name).toBe("scale")
    expect(Scale.layouts).toEqual({ nested: { key: "scale" }, prefixed: { prefix: "scale:" } })
  })

  it("decodes with the schema", () => {
    expect(Scale.decode({ factors: [1, 2] })).toEqual({ factors: [1, 2] })
  })

  it("reports every zod issue", () => {
    const err = catchError(() => Scale.decode({ factors: [1, -2], unit: 5 }))

    expect(err).toBeInstanceOf(DecodeMismatchError)
    expect(err).toMatchObject({
      code: "decode_mismatch",
      context: {
        convention: "scale",
        issues: [
          expect.objectContaining({ path: "factors.1" }),
          expect.objectContaining({ path: "unit" }),
        ],
      },
    })
    expect(err).toHaveProperty("cause", expect.any(z.ZodError))
  })

  it("encodes to a JSON object without undefined fields", () => {
    expect(Scale.encode({ factors: [0.5], unit: undefined })).toEqual({ factors: [0.5] })
  })

  it("raises EncodeError for values that are not JSON", () => {
    expect(() => Scale.encode({ factors: [Number.NaN] })).toThrow(EncodeError)
  })
})
