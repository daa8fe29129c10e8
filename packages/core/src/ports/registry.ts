import type { ConventionDefinition, ConventionId, ManifestEntry } from "./convention"

/**
 * Lookup table of known conventions.
 *
 * @remarks
 * - Append-only: definitions are never removed.
 * - Registering an identical definition twice is a no-op.
 * - Registering a different definition under a uuid, schema URL or spec URL
 *   that is already taken throws `RegistrationConflictError`.
 * - Lookups never throw; an unknown identifier yields `undefined`.
 */
export interface ConventionRegistry {
  register(definition: ConventionDefinition): void

  lookupByUuid(uuid: string): ConventionDefinition | undefined
  lookupBySchemaUrl(url: string): ConventionDefinition | undefined
  lookupBySpecUrl(url: string): ConventionDefinition | undefined
  lookup(id: ConventionId): ConventionDefinition | undefined

  has(id: ConventionId): boolean

  /**
   * Find the definition a manifest entry refers to, trying its identifying
   * fields in preference order.
   */
  resolve(entry: ManifestEntry): ConventionDefinition | undefined

  /** All definitions, in registration order. */
  definitions(): readonly ConventionDefinition[]
}
