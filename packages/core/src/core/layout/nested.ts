import type { NestedConventionType } from "../../ports/convention"
import type { Attributes, JsonObject } from "../../ports/json"
import { DecodeMismatchError } from "../errors/errors"
import { isJsonObject, toJsonObject } from "../json/json"
import { decodePayload } from "./layout"

export function hasNested(attributes: Attributes, key: string): boolean {
  return Object.hasOwn(attributes, key)
}

/**
 * Decode a convention stored as one object under its key.
 *
 * @returns `undefined` when the key is absent
 * @throws DecodeMismatchError when the value is not an object or the decoder rejects it
 */
export function readNested<T>(
  attributes: Attributes,
  type: NestedConventionType<T>,
): T | undefined {
  const { key } = type.layouts.nested
  if (!hasNested(attributes, key)) return undefined

  const value = attributes[key]

  if (!isJsonObject(value)) {
    throw new DecodeMismatchError(
      `Nested value of convention "${type.definition.name}" at "${key}" must be an object`,
      {
        context: {
          convention: type.definition.name,
          key,
          type: Array.isArray(value) ? "array" : value === null ? "null" : typeof value,
        },
      },
    )
  }

  return decodePayload(type, value, "nested")
}

/**
 * The single key/value pair a value occupies in nested form.
 */
export function encodeNested<T>(
  type: NestedConventionType<T>,
  value: T,
): [key: string, payload: JsonObject] {
  return [type.layouts.nested.key, toJsonObject(type.encode(value))]
}
