import {
  type ConventionRegistry,
  defaultConventionRegistry,
  defineConvention,
  registerConventions,
  zodConvention,
} from "@zarr-conventions/core"
import { z } from "zod"

/**
 * Metadata following the Unified Code for Units of Measure (https://ucum.org/ucum).
 */
export const ucumSchema = z.object({
  /**
   * Case-sensitive UCUM unit string, possibly with a magnitude term.
   * When absent, an arbitrary unit of magnitude 1 is assumed.
   */
  unit: z.string().optional(),
  /** Version of the UCUM specification. */
  version: z.string().optional(),
})

export const unitOfMeasurementSchema = z.object({
  ucum: ucumSchema,
  /** Free-text description of the measured quantity. */
  description: z.string().optional(),
})

export type Ucum = z.output<typeof ucumSchema>

export type UnitOfMeasurement = z.output<typeof unitOfMeasurementSchema>

/**
 * Builder for {@link UnitOfMeasurement}. Every field is optional.
 */
export class UnitOfMeasurementBuilder {
  private readonly ucum: Ucum = {}
  private text: string | undefined

  /** Case-sensitive UCUM string, which may carry a magnitude term. */
  unit(unit: string): this {
    this.ucum.unit = unit
    return this
  }

  version(version: string): this {
    this.ucum.version = version
    return this
  }

  description(description: string): this {
    this.text = description
    return this
  }

  build(): UnitOfMeasurement {
    return {
      ucum: { ...this.ucum },
      ...(this.text !== undefined && { description: this.text }),
    }
  }
}

/**
 * Units of measurement for numerical arrays, stored under the `uom` key.
 *
 * @example
 * ```ts
 * const attrs = new AttributesBuilder()
 *   .addNested(UnitOfMeasurement, UnitOfMeasurement.builder().unit("Cel").build())
 *   .build()
 * // { zarr_conventions: [...], uom: { ucum: { unit: "Cel" } } }
 * ```
 */
export const UnitOfMeasurement = {
  ...zodConvention({
    definition: defineConvention({
      uuid: "3bbe438d-df37-49fe-8e2b-739296d46dfb",
      schemaUrl:
        "https://raw.githubusercontent.com/clbarnes/zarr-convention-uom/refs/tags/v1/schema.json",
      specUrl: "https://github.com/clbarnes/zarr-convention-uom/blob/v1/README.md",
      name: "uom",
      description: "Units of measurement for Zarr arrays",
    }),
    schema: unitOfMeasurementSchema,
    layouts: { nested: { key: "uom" } },
  }),

  builder(): UnitOfMeasurementBuilder {
    return new UnitOfMeasurementBuilder()
  },
}

export function registerUnitOfMeasurement(
  registry: ConventionRegistry = defaultConventionRegistry,
): ConventionRegistry {
  return registerConventions([UnitOfMeasurement], registry)
}
