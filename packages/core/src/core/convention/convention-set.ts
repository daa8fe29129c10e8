import type {
  ConventionDefinition,
  ConventionId,
  ManifestEntry,
} from "../../ports/convention"
import { definitionIds, entryIds } from "./convention-id"

/**
 * Identifiers listed in a manifest, for "is this convention in use" checks.
 */
export class ConventionSet {
  private readonly uuids = new Set<string>()
  private readonly schemaUrls = new Set<string>()
  private readonly specUrls = new Set<string>()

  constructor(entries: readonly ManifestEntry[] = []) {
    for (const entry of entries) {
      for (const id of entryIds(entry)) this.bucket(id).add(id.value)
    }
  }

  private bucket(id: ConventionId): Set<string> {
    switch (id.kind) {
      case "uuid":
        return this.uuids
      case "schema_url":
        return this.schemaUrls
      case "spec_url":
        return this.specUrls
    }
  }

  hasId(id: ConventionId): boolean {
    const value = id.kind === "uuid" ? id.value.toLowerCase() : id.value
    return this.bucket(id).has(value)
  }

  /** True if any of the definition's identifiers is listed. */
  has(definition: ConventionDefinition): boolean {
    return definitionIds(definition).some((id) => this.hasId(id))
  }

  get isEmpty(): boolean {
    return this.uuids.size === 0 && this.schemaUrls.size === 0 && this.specUrls.size === 0
  }
}
