import type { JsonObject, JsonValue } from "../../ports/json"
import { EncodeError } from "../errors/errors"

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * True for plain objects, the only shape a convention payload may take.
 * Arrays, null and class instances are rejected.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return isPlainObject(value)
}

/**
 * Define `key` as an own enumerable property. Plain assignment would treat
 * `"__proto__"` as a prototype change and lose the value.
 */
export function setOwn(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  })
}

function formatPath(path: readonly (string | number)[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${part}` : part
  }
  return out || "<root>"
}

function convert(value: unknown, path: (string | number)[], ancestors: WeakSet<object>): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new EncodeError(`Non-finite number at ${formatPath(path)}`, {
        context: { path: formatPath(path), value },
      })
    }
    return value
  }

  if (Array.isArray(value) || isPlainObject(value)) {
    if (ancestors.has(value)) {
      throw new EncodeError(`Circular reference at ${formatPath(path)}`, {
        context: { path: formatPath(path) },
      })
    }
    ancestors.add(value)
    try {
      if (Array.isArray(value)) {
        return value.map((item, i) => convert(item, [...path, i], ancestors))
      }

      const out: JsonObject = {}
      for (const [k, v] of Object.entries(value)) {
        if (v === undefined) continue
        setOwn(out, k, convert(v, [...path, k], ancestors))
      }
      return out
    } finally {
      ancestors.delete(value)
    }
  }

  throw new EncodeError(`Value at ${formatPath(path)} is not JSON-encodable`, {
    context: { path: formatPath(path), type: typeof value },
  })
}

/**
 * Deep-copy a value into plain JSON.
 *
 * Object properties holding `undefined` are dropped. Functions, symbols,
 * bigints, non-finite numbers, `undefined` outside an object, class
 * instances and circular references throw `EncodeError`.
 */
export function toJsonValue(value: unknown): JsonValue {
  return convert(value, [], new WeakSet())
}

/**
 * Like {@link toJsonValue} but the result must be an object.
 */
export function toJsonObject(value: unknown): JsonObject {
  const json = convert(value, [], new WeakSet())
  if (!isJsonObject(json)) {
    throw new EncodeError("Convention payload must encode to a JSON object", {
      context: { type: Array.isArray(json) ? "array" : json === null ? "null" : typeof json },
    })
  }
  return json
}
