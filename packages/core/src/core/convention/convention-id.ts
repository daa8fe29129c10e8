import type {
  ConventionDefinition,
  ConventionId,
  ManifestEntry,
} from "../../ports/convention"

export function definitionIds(definition: ConventionDefinition): ConventionId[] {
  return [
    { kind: "uuid", value: definition.uuid },
    { kind: "schema_url", value: definition.schemaUrl },
    { kind: "spec_url", value: definition.specUrl },
  ]
}

/**
 * Identifying fields of an entry, most preferred first.
 */
export function entryIds(entry: ManifestEntry): ConventionId[] {
  const ids: ConventionId[] = []
  if (entry.uuid !== undefined) ids.push({ kind: "uuid", value: entry.uuid })
  if (entry.schemaUrl !== undefined) ids.push({ kind: "schema_url", value: entry.schemaUrl })
  if (entry.specUrl !== undefined) ids.push({ kind: "spec_url", value: entry.specUrl })
  return ids
}

/**
 * The identifier a reader should key on: uuid, else schema URL, else spec URL.
 * `undefined` only for entries that bypassed manifest validation.
 */
export function preferredId(entry: ManifestEntry): ConventionId | undefined {
  return entryIds(entry)[0]
}

/** Short label for logs and error messages. */
export function describeEntry(entry: ManifestEntry): string {
  return entry.name ?? preferredId(entry)?.value ?? "<unidentified>"
}
