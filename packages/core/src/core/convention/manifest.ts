import { z } from "zod"
import type { ConventionDefinition, ManifestEntry } from "../../ports/convention"
import type { JsonObject } from "../../ports/json"
import { InvalidBuilderConfigurationError, MalformedManifestEntryError } from "../errors/errors"

/**
 * Which definition fields are copied into each manifest entry.
 */
export type ManifestFields = {
  uuid: boolean
  schemaUrl: boolean
  specUrl: boolean
  name: boolean
  description: boolean
}

export const DEFAULT_MANIFEST_FIELDS: Readonly<ManifestFields> = Object.freeze({
  uuid: true,
  schemaUrl: true,
  specUrl: true,
  name: true,
  description: true,
})

export function hasIdentifyingField(fields: Readonly<ManifestFields>): boolean {
  return fields.uuid || fields.schemaUrl || fields.specUrl
}

const wireEntrySchema = z
  .object({
    uuid: z.guid().optional(),
    schema_url: z.url().optional(),
    spec_url: z.url().optional(),
    name: z.string().optional(),
    description: z.string().optional(),
  })
  .refine(
    (e) => e.uuid !== undefined || e.schema_url !== undefined || e.spec_url !== undefined,
    { error: "At least one of uuid, schema_url or spec_url must be set" },
  )

/**
 * Parse the value of the `zarr_conventions` key.
 *
 * @remarks
 * Unknown fields inside an entry are ignored. UUIDs are lowercased.
 *
 * @throws MalformedManifestEntryError when the value is not an array, or an
 * entry is not an object, has a field of the wrong type, or has no
 * identifying field
 */
export function parseManifest(value: unknown): ManifestEntry[] {
  if (!Array.isArray(value)) {
    throw new MalformedManifestEntryError("zarr_conventions must be an array of objects", {
      context: { type: value === null ? "null" : typeof value },
    })
  }

  return value.map((item, index) => {
    const result = wireEntrySchema.safeParse(item)

    if (!result.success) {
      const message = result.error.issues[0]?.message ?? "Invalid entry"
      throw new MalformedManifestEntryError(
        `Invalid zarr_conventions entry at index ${index}: ${message}`,
        {
          context: {
            index,
            issues: result.error.issues.map((i) => ({
              path: i.path.map(String).join("."),
              message: i.message,
            })),
          },
        },
      )
    }

    const e = result.data

    return Object.freeze({
      ...(e.uuid !== undefined && { uuid: e.uuid.toLowerCase() }),
      ...(e.schema_url !== undefined && { schemaUrl: e.schema_url }),
      ...(e.spec_url !== undefined && { specUrl: e.spec_url }),
      ...(e.name !== undefined && { name: e.name }),
      ...(e.description !== undefined && { description: e.description }),
    })
  })
}

/**
 * Wire form of an entry, keys in the order uuid, schema_url, spec_url,
 * name, description.
 */
export function serializeManifestEntry(entry: ManifestEntry): JsonObject {
  return {
    ...(entry.uuid !== undefined && { uuid: entry.uuid }),
    ...(entry.schemaUrl !== undefined && { schema_url: entry.schemaUrl }),
    ...(entry.specUrl !== undefined && { spec_url: entry.specUrl }),
    ...(entry.name !== undefined && { name: entry.name }),
    ...(entry.description !== undefined && { description: entry.description }),
  }
}

/**
 * Project a definition onto a manifest entry.
 *
 * @throws InvalidBuilderConfigurationError when `fields` enables none of
 * uuid, schemaUrl and specUrl
 */
export function manifestEntryFromDefinition(
  definition: ConventionDefinition,
  fields: Readonly<ManifestFields>,
): ManifestEntry {
  if (!hasIdentifyingField(fields)) {
    throw new InvalidBuilderConfigurationError(
      "At least one convention identifier (uuid, schema_url, spec_url) must be enabled",
      { context: { convention: definition.name, fields: { ...fields } } },
    )
  }

  return Object.freeze({
    ...(fields.uuid && { uuid: definition.uuid }),
    ...(fields.schemaUrl && { schemaUrl: definition.schemaUrl }),
    ...(fields.specUrl && { specUrl: definition.specUrl }),
    ...(fields.name && { name: definition.name }),
    ...(fields.description && { description: definition.description }),
  })
}
