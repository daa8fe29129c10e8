import { MANIFEST_KEY, type PrefixedConventionType } from "../../ports/convention"
import type { Attributes, JsonObject, JsonValue } from "../../ports/json"
import { EncodeError } from "../errors/errors"
import { setOwn, toJsonObject } from "../json/json"
import { decodePayload } from "./layout"

/**
 * Top-level keys belonging to a prefix, in document order.
 *
 * The manifest key and a key equal to the bare prefix never belong to it.
 */
export function prefixedKeys(attributes: Attributes, prefix: string): string[] {
  return Object.keys(attributes).filter(
    (k) => k !== MANIFEST_KEY && k.length > prefix.length && k.startsWith(prefix),
  )
}

/**
 * Convert a flat prefixed representation into an object.
 *
 * @example
 * ```ts
 * collectPrefixed({ "proj:code": "EPSG:4326", "proj:wkt2": "...", other: 1 }, "proj:")
 * // { code: "EPSG:4326", wkt2: "..." }
 * ```
 *
 * @returns `undefined` when no key carries the prefix
 */
export function collectPrefixed(attributes: Attributes, prefix: string): JsonObject | undefined {
  const keys = prefixedKeys(attributes, prefix)
  if (keys.length === 0) return undefined

  const out: JsonObject = {}
  for (const key of keys) {
    const value = attributes[key]
    if (value !== undefined) setOwn(out, key.slice(prefix.length), value)
  }
  return out
}

/**
 * Decode a convention stored as flat `prefix + field` keys.
 *
 * @returns `undefined` when no key carries the prefix
 * @throws DecodeMismatchError when the decoder rejects the collected fields
 */
export function readPrefixed<T>(
  attributes: Attributes,
  type: PrefixedConventionType<T>,
): T | undefined {
  const collected = collectPrefixed(attributes, type.layouts.prefixed.prefix)
  if (collected === undefined) return undefined

  return decodePayload(type, collected, "prefixed")
}

/**
 * The key/value pairs a value occupies in prefixed form.
 */
export function encodePrefixed<T>(
  type: PrefixedConventionType<T>,
  value: T,
): [key: string, value: JsonValue][] {
  const { prefix } = type.layouts.prefixed
  return Object.entries(toJsonObject(type.encode(value))).map(([field, v]): [string, JsonValue] => {
    if (field === "") {
      throw new EncodeError(
        `Convention "${type.definition.name}" has an empty field name, which has no prefixed form`,
        { context: { convention: type.definition.name, prefix } },
      )
    }
    return [`${prefix}${field}`, v]
  })
}
