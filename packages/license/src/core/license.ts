import {
  type ConventionRegistry,
  defaultConventionRegistry,
  defineConvention,
  registerConventions,
  zodConvention,
} from "@zarr-conventions/core"
import { LicenseBuilder } from "./license-builder"
import { type LicenseField, licenseFields, licenseSchema, type LicenseValue } from "./license-schema"

/** A single license applying to the data. */
export type License = LicenseValue

/**
 * Dataset licensing information, stored under the `license` key.
 *
 * @example
 * ```ts
 * const attrs = new AttributesBuilder()
 *   .addNested(License, License.builder().spdx("CC-BY-4.0").build())
 *   .build()
 * ```
 */
export const License = {
  ...zodConvention({
    definition: defineConvention({
      uuid: "b77365e5-2b0c-4141-b917-c03b7c68e935",
      schemaUrl:
        "https://raw.githubusercontent.com/clbarnes/zarr-convention-license/refs/tags/v1/schema.json",
      specUrl: "https://github.com/clbarnes/zarr-convention-license/blob/v1/README.md",
      name: "license",
      description: "Dataset licensing information.",
    }),
    schema: licenseSchema,
    layouts: { nested: { key: "license" } },
  }),

  builder(): LicenseBuilder {
    return new LicenseBuilder()
  },
}

/**
 * The most preferred field set on a license, `undefined` for an empty one.
 */
export function preferredLicenseField(license: License): LicenseField | undefined {
  return licenseFields.find((f) => license[f] !== undefined)
}

export function registerLicense(
  registry: ConventionRegistry = defaultConventionRegistry,
): ConventionRegistry {
  return registerConventions([License], registry)
}
