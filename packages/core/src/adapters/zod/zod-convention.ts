import { z } from "zod"
import type {
  ConventionDefinition,
  ConventionLayouts,
  ConventionType,
} from "../../ports/convention"
import { DecodeMismatchError } from "../../core/errors/errors"
import { toJsonObject } from "../../core/json/json"

export type ZodConventionOptions<S extends z.ZodType, L extends ConventionLayouts> = {
  definition: ConventionDefinition
  /** Schema of the payload object. Must describe an object. */
  schema: S
  layouts: L
}

/**
 * Convention type whose payload is validated by a zod schema.
 *
 * @example
 * ```ts
 * const Proj = zodConvention({
 *   definition: defineConvention({ ... }),
 *   schema: z.object({ code: z.string() }),
 *   layouts: { nested: { key: "proj" }, prefixed: { prefix: "proj:" } },
 * })
 * ```
 */
export function zodConvention<S extends z.ZodType, L extends ConventionLayouts>(
  options: ZodConventionOptions<S, L>,
): ConventionType<z.output<S>> & { readonly layouts: L } {
  const { definition, schema, layouts } = options

  return {
    definition,
    layouts,

    decode(value) {
      const result = z.safeParse(schema, value)

      if (!result.success) {
        const issues = result.error.issues.map((i) => ({
          path: i.path.map(String).join("."),
          message: i.message,
        }))
        throw new DecodeMismatchError(
          `Convention "${definition.name}" rejected its payload: ${issues[0]?.message ?? "invalid value"}`,
          { context: { convention: definition.name, issues }, cause: result.error },
        )
      }

      return result.data
    },

    encode(value) {
      return toJsonObject(value)
    },
  }
}
