import type {
  ConventionType,
  NestedConventionType,
  PrefixedConventionType,
} from "../../ports/convention"
import type { JsonObject } from "../../ports/json"
import { DecodeMismatchError, isConventionError, UnsupportedLayoutError } from "../errors/errors"

export type LayoutKind = "nested" | "prefixed"

export function supportsNested<T>(type: ConventionType<T>): type is NestedConventionType<T> {
  return type.layouts.nested !== undefined
}

export function supportsPrefixed<T>(type: ConventionType<T>): type is PrefixedConventionType<T> {
  return type.layouts.prefixed !== undefined
}

export function assertNested<T>(
  type: ConventionType<T>,
): asserts type is NestedConventionType<T> {
  if (!supportsNested(type)) throw unsupported(type, "nested")
}

export function assertPrefixed<T>(
  type: ConventionType<T>,
): asserts type is PrefixedConventionType<T> {
  if (!supportsPrefixed(type)) throw unsupported(type, "prefixed")
}

function unsupported(type: ConventionType<unknown>, layout: LayoutKind): UnsupportedLayoutError {
  return new UnsupportedLayoutError(
    `Convention "${type.definition.name}" does not support the ${layout} layout`,
    { context: { convention: type.definition.name, layout } },
  )
}

/**
 * Run the type's decoder, turning any rejection into a DecodeMismatchError.
 */
export function decodePayload<T>(
  type: ConventionType<T>,
  payload: JsonObject,
  layout: LayoutKind,
): T {
  try {
    return type.decode(payload)
  } catch (err) {
    if (isConventionError(err, "decode_mismatch")) throw err

    throw new DecodeMismatchError(
      `Convention "${type.definition.name}" could not be decoded from its ${layout} form`,
      { context: { convention: type.definition.name, layout }, cause: err },
    )
  }
}
