import type { JsonObject } from "./json"

/**
 * Reserved top-level attribute key holding the convention manifest.
 */
export const MANIFEST_KEY = "zarr_conventions"

/**
 * Static identity of a convention.
 *
 * @remarks
 * `uuid` is the stable identifier. `schemaUrl` is unique in practice but this
 * is not enforced beyond registry conflicts.
 */
export type ConventionDefinition = Readonly<{
  /** Canonical lowercase textual UUID. */
  uuid: string
  /** Absolute URL of the convention's JSON Schema. */
  schemaUrl: string
  /** Absolute URL of the human-readable specification. */
  specUrl: string
  name: string
  description: string
}>

/**
 * One object of the `zarr_conventions` list.
 *
 * At least one of `uuid`, `schemaUrl` or `specUrl` is always present.
 */
export type ManifestEntry = Readonly<{
  uuid?: string
  schemaUrl?: string
  specUrl?: string
  name?: string
  description?: string
}>

export type ConventionIdKind = "uuid" | "schema_url" | "spec_url"

/**
 * A single identifying field of a convention.
 * Preference when several are known: uuid, then schema_url, then spec_url.
 */
export type ConventionId = Readonly<{
  kind: ConventionIdKind
  value: string
}>

export type NestedLayout = Readonly<{
  /** Top-level attribute key holding the payload object, e.g. `"proj"`. */
  key: string
}>

export type PrefixedLayout = Readonly<{
  /** Key prefix including its delimiter, e.g. `"proj:"`. */
  prefix: string
}>

export type ConventionLayouts = Readonly<{
  nested?: NestedLayout
  prefixed?: PrefixedLayout
}>

/**
 * A convention type: its identity, the layouts it supports and the codec
 * between its payload and a JSON object.
 *
 * @typeParam T - The decoded payload.
 *
 * @example
 * ```ts
 * const Proj: ConventionType<{ code: string }> = {
 *   definition: defineConvention({ ... }),
 *   layouts: { nested: { key: "proj" }, prefixed: { prefix: "proj:" } },
 *   decode: (value) => projSchema.parse(value),
 *   encode: (value) => ({ code: value.code }),
 * }
 * ```
 */
export interface ConventionType<T> {
  readonly definition: ConventionDefinition
  readonly layouts: ConventionLayouts

  /**
   * Decode the payload object. Throws when the value does not have the
   * convention's shape.
   */
  decode(value: JsonObject): T

  /**
   * Encode the payload. Must produce a JSON object; `undefined` fields are
   * dropped by the layouts.
   */
  encode(value: T): Record<string, unknown>
}

export type NestedConventionType<T> = ConventionType<T> & {
  readonly layouts: ConventionLayouts & { readonly nested: NestedLayout }
}

export type PrefixedConventionType<T> = ConventionType<T> & {
  readonly layouts: ConventionLayouts & { readonly prefixed: PrefixedLayout }
}
