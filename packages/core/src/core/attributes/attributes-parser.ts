import { createNullLogger, type Logger } from "@zarr-conventions/logger"
import {
  type ConventionDefinition,
  type ConventionType,
  MANIFEST_KEY,
  type ManifestEntry,
} from "../../ports/convention"
import type { Attributes, JsonValue } from "../../ports/json"
import type { ConventionRegistry } from "../../ports/registry"
import { describeEntry } from "../convention/convention-id"
import { ConventionSet } from "../convention/convention-set"
import { parseManifest } from "../convention/manifest"
import {
  DecodeMismatchError,
  InvalidAttributesError,
  RepresentationConflictError,
  UnsupportedLayoutError,
} from "../errors/errors"
import { isJsonObject } from "../json/json"
import { assertNested, assertPrefixed, supportsNested, supportsPrefixed } from "../layout/layout"
import { hasNested, readNested } from "../layout/nested"
import { prefixedKeys, readPrefixed } from "../layout/prefixed"
import { defaultConventionRegistry } from "../registry/default-registry"

export type AttributesParserOptions = {
  /** Registry used by resolveManifest(). Defaults to the process-wide registry. */
  registry?: ConventionRegistry
  logger?: Logger
}

/**
 * Anything that validates an unknown value into `T` by throwing on mismatch,
 * such as a zod schema.
 */
export type ValueSchema<T> = {
  parse(value: unknown): T
}

export type ResolvedManifestEntry = Readonly<{
  index: number
  entry: ManifestEntry
  /** `undefined` when the registry does not know the convention. */
  definition: ConventionDefinition | undefined
}>

/**
 * Read conventional and unstructured metadata from an attributes map.
 *
 * @remarks
 * Presence of a convention is decided by the keys actually in the map. The
 * `zarr_conventions` manifest is only used for discovery (`manifest()`,
 * `inUse()`, `resolveManifest()`), never to decide whether `parse*` returns a
 * value.
 *
 * @example
 * ```ts
 * const parser = AttributesParser.fromJson(JSON.parse(text).attributes)
 * const license = parser.parseNested(License)   // License | undefined
 * const units = parser.get("units", z.string())  // string | undefined
 * ```
 */
export class AttributesParser {
  private readonly attributes: Attributes
  private readonly entries: readonly ManifestEntry[]
  private readonly registry: ConventionRegistry
  private readonly logger: Logger
  private inUseSet: ConventionSet | undefined

  /**
   * @throws MalformedManifestEntryError when `zarr_conventions` is present
   * but is not a list of well-formed entries
   */
  constructor(attributes: Attributes, options: AttributesParserOptions = {}) {
    this.attributes = attributes
    this.registry = options.registry ?? defaultConventionRegistry
    this.logger = (options.logger ?? createNullLogger()).child({ module: "parser" })
    this.entries = Object.freeze(
      Object.hasOwn(attributes, MANIFEST_KEY) ? parseManifest(attributes[MANIFEST_KEY]) : [],
    )
  }

  /**
   * Build a parser from an untyped value, e.g. straight out of `JSON.parse`.
   *
   * @throws InvalidAttributesError when the value is not a JSON object
   */
  static fromJson(value: unknown, options?: AttributesParserOptions): AttributesParser {
    if (!isJsonObject(value)) {
      throw new InvalidAttributesError("Attributes must be a JSON object", {
        context: { type: Array.isArray(value) ? "array" : value === null ? "null" : typeof value },
      })
    }
    return new AttributesParser(value, options)
  }

  /**
   * Build a parser from a whole Zarr node metadata document
   * (`zarr.json`), reading its `attributes` field. A document without
   * attributes yields an empty map.
   */
  static fromMetadata(document: unknown, options?: AttributesParserOptions): AttributesParser {
    if (!isJsonObject(document)) {
      throw new InvalidAttributesError("Zarr metadata must be a JSON object", {
        context: { field: "<root>" },
      })
    }
    const attributes = document.attributes
    return AttributesParser.fromJson(attributes === undefined ? {} : attributes, options)
  }

  manifest(): readonly ManifestEntry[] {
    return this.entries
  }

  conventions(): ConventionSet {
    this.inUseSet ??= new ConventionSet(this.entries)
    return this.inUseSet
  }

  /** Whether the manifest lists the convention. Says nothing about its data. */
  inUse(type: Pick<ConventionType<unknown>, "definition">): boolean {
    return this.conventions().has(type.definition)
  }

  /**
   * Pair every manifest entry with the registry's definition.
   * Unknown conventions are legal and come back with `definition: undefined`.
   */
  resolveManifest(): ResolvedManifestEntry[] {
    return this.entries.map((entry, index) => {
      const definition = this.registry.resolve(entry)

      if (!definition) {
        this.logger.debug("Manifest entry does not match a registered convention", {
          index,
          convention: describeEntry(entry),
        })
      }

      return { index, entry, definition }
    })
  }

  /**
   * @returns the decoded value, or `undefined` when the nested key is absent
   * @throws UnsupportedLayoutError when the type has no nested layout
   * @throws DecodeMismatchError when the key holds something the type rejects
   */
  parseNested<T>(type: ConventionType<T>): T | undefined {
    assertNested(type)
    this.logger.trace("Parsing nested convention", {
      operation: "parse_nested",
      convention: type.definition.name,
      key: type.layouts.nested.key,
    })
    return readNested(this.attributes, type)
  }

  /**
   * @returns the decoded value, or `undefined` when no key carries the prefix
   * @throws UnsupportedLayoutError when the type has no prefixed layout
   * @throws DecodeMismatchError when the collected fields are rejected
   */
  parsePrefixed<T>(type: ConventionType<T>): T | undefined {
    assertPrefixed(type)
    this.logger.trace("Parsing prefixed convention", {
      operation: "parse_prefixed",
      convention: type.definition.name,
      prefix: type.layouts.prefixed.prefix,
    })
    return readPrefixed(this.attributes, type)
  }

  /**
   * Parse whichever layout is present.
   *
   * For a type supporting both layouts exactly one form may be present.
   *
   * @throws RepresentationConflictError when the nested key and prefixed keys
   * are both present
   */
  parse<T>(type: ConventionType<T>): T | undefined {
    const nested = supportsNested(type)
    const prefixed = supportsPrefixed(type)

    if (nested && !prefixed) return this.parseNested(type)
    if (prefixed && !nested) return this.parsePrefixed(type)

    if (!supportsNested(type) || !supportsPrefixed(type)) {
      throw new UnsupportedLayoutError(
        `Convention "${type.definition.name}" declares no layout`,
        { context: { convention: type.definition.name } },
      )
    }

    const { key } = type.layouts.nested
    const { prefix } = type.layouts.prefixed
    const nestedPresent = hasNested(this.attributes, key)
    const flatKeys = prefixedKeys(this.attributes, prefix)

    if (nestedPresent && flatKeys.length > 0) {
      throw new RepresentationConflictError(
        `Convention "${type.definition.name}" is present both under "${key}" and as "${prefix}*" keys`,
        { context: { convention: type.definition.name, key, prefixedKeys: flatKeys } },
      )
    }

    if (nestedPresent) return this.parseNested(type)
    if (flatKeys.length > 0) return this.parsePrefixed(type)
    return undefined
  }

  /**
   * Raw access to a top-level attribute.
   *
   * @returns `undefined` when the key is absent
   * @throws DecodeMismatchError when a schema is given and rejects the value
   */
  get(key: string): JsonValue | undefined
  get<T>(key: string, schema: ValueSchema<T>): T | undefined
  get<T>(key: string, schema?: ValueSchema<T>): T | JsonValue | undefined {
    if (!Object.hasOwn(this.attributes, key)) return undefined

    const value = this.attributes[key]
    if (!schema) return value

    try {
      return schema.parse(value)
    } catch (err) {
      throw new DecodeMismatchError(`Attribute "${key}" does not have the expected shape`, {
        context: { key },
        cause: err,
      })
    }
  }

  /**
   * Keys that are neither the manifest nor claimed by the given conventions'
   * nested key or prefix, in document order.
   */
  unrecognizedKeys(...types: ConventionType<unknown>[]): string[] {
    const claimed = new Set<string>([MANIFEST_KEY])
    for (const type of types) {
      if (supportsNested(type)) claimed.add(type.layouts.nested.key)
      if (supportsPrefixed(type)) {
        for (const k of prefixedKeys(this.attributes, type.layouts.prefixed.prefix)) {
          claimed.add(k)
        }
      }
    }
    return Object.keys(this.attributes).filter((k) => !claimed.has(k))
  }
}
