import { createNullLogger, type Logger } from "@zarr-conventions/logger"
import {
  type ConventionDefinition,
  type ConventionType,
  MANIFEST_KEY,
} from "../../ports/convention"
import type { IConfig } from "../../ports/config"
import type { Attributes, JsonValue } from "../../ports/json"
import {
  DEFAULT_MANIFEST_FIELDS,
  hasIdentifyingField,
  type ManifestFields,
  manifestEntryFromDefinition,
  serializeManifestEntry,
} from "../convention/manifest"
import type { ConventionsConfig } from "../config/schema"
import { manifestFieldsFromConfig } from "../config/manifest-fields"
import {
  BuilderConsumedError,
  InvalidBuilderConfigurationError,
  KeyCollisionError,
  RepresentationConflictError,
} from "../errors/errors"
import { setOwn, toJsonValue } from "../json/json"
import { assertNested, assertPrefixed, type LayoutKind } from "../layout/layout"
import { encodeNested } from "../layout/nested"
import { encodePrefixed } from "../layout/prefixed"

export type AttributesBuilderOptions = Partial<ManifestFields> & {
  logger?: Logger
}

type KeyOwner =
  | { readonly kind: "attribute" }
  | { readonly kind: "convention"; readonly uuid: string }

type AddedConvention = {
  readonly definition: ConventionDefinition
  readonly layout: LayoutKind
  /** Prefix of a prefixed convention, whose whole namespace it owns. */
  readonly prefix?: string
}

function inNamespace(key: string, prefix: string): boolean {
  return key.length > prefix.length && key.startsWith(prefix)
}

/**
 * Build an attributes map holding conventional and unstructured metadata,
 * with a `zarr_conventions` manifest listing every convention added.
 *
 * @remarks
 * - A failed `add*` call leaves the builder unchanged and it may be used again.
 * - `build()` consumes the builder; any later call throws BuilderConsumedError.
 *
 * @example
 * ```ts
 * const attributes = new AttributesBuilder({ description: false })
 *   .addNested(License, License.builder().spdx("MIT").build())
 *   .addPrefixed(Proj, { code: "EPSG:4326" })
 *   .addAttribute("title", "Sea surface temperature")
 *   .build()
 * ```
 */
export class AttributesBuilder {
  private readonly fields: ManifestFields
  private readonly values = new Map<string, JsonValue>()
  private readonly owners = new Map<string, KeyOwner>()
  private readonly added = new Map<string, AddedConvention>()
  private readonly logger: Logger
  private consumed = false

  constructor(options: AttributesBuilderOptions = {}) {
    const { logger, ...fields } = options
    this.fields = { ...DEFAULT_MANIFEST_FIELDS, ...fields }
    this.logger = (logger ?? createNullLogger()).child({ module: "builder" })
  }

  static fromConfig(
    config: IConfig<ConventionsConfig>,
    options: { logger?: Logger } = {},
  ): AttributesBuilder {
    return new AttributesBuilder({ ...manifestFieldsFromConfig(config), ...options })
  }

  /** Whether manifest entries carry the convention's UUID. */
  includeUuid(enable: boolean): this {
    this.fields.uuid = enable
    return this
  }

  /** Whether manifest entries carry the convention's schema URL. */
  includeSchemaUrl(enable: boolean): this {
    this.fields.schemaUrl = enable
    return this
  }

  /** Whether manifest entries carry the convention's specification URL. */
  includeSpecUrl(enable: boolean): this {
    this.fields.specUrl = enable
    return this
  }

  includeName(enable: boolean): this {
    this.fields.name = enable
    return this
  }

  includeDescription(enable: boolean): this {
    this.fields.description = enable
    return this
  }

  /**
   * Write a convention as one object under its nested key and list it in the
   * manifest. Adding the same convention again replaces its value.
   *
   * @throws InvalidBuilderConfigurationError when no identifying manifest field is enabled
   * @throws UnsupportedLayoutError when the type has no nested layout
   * @throws EncodeError when the value does not encode to a JSON object
   * @throws KeyCollisionError when the key is taken by other data
   * @throws RepresentationConflictError when the convention was added in prefixed form
   */
  addNested<T>(type: ConventionType<T>, value: T): this {
    this.assertUsable()
    this.assertIdentifiable(type.definition)
    assertNested(type)

    const [key, payload] = encodeNested(type, value)
    const { uuid } = type.definition

    this.assertSameLayout(type.definition, "nested")
    this.assertWritable(key, uuid)

    this.release(uuid)
    this.claim(key, payload, { kind: "convention", uuid })
    this.record({ definition: type.definition, layout: "nested" })

    this.logger.debug("Added nested convention", {
      operation: "add_nested",
      convention: type.definition.name,
      key,
    })
    return this
  }

  /**
   * Write a convention as flat `prefix + field` keys and list it in the
   * manifest. Adding the same convention again replaces all of its keys.
   *
   * @throws InvalidBuilderConfigurationError when no identifying manifest field is enabled
   * @throws UnsupportedLayoutError when the type has no prefixed layout
   * @throws EncodeError when the value does not encode to a JSON object
   * @throws KeyCollisionError when a resulting key, or any existing key under
   * the prefix, belongs to other data
   * @throws RepresentationConflictError when the convention was added in nested form
   */
  addPrefixed<T>(type: ConventionType<T>, value: T): this {
    this.assertUsable()
    this.assertIdentifiable(type.definition)
    assertPrefixed(type)

    const { prefix } = type.layouts.prefixed
    const { uuid } = type.definition
    const pairs = encodePrefixed(type, value)

    this.assertSameLayout(type.definition, "prefixed")

    for (const existing of this.values.keys()) {
      if (inNamespace(existing, prefix) && !this.ownedBy(existing, uuid)) {
        throw this.collision(existing, `prefix "${prefix}" of "${type.definition.name}"`)
      }
    }
    for (const [key] of pairs) this.assertWritable(key, uuid)

    this.release(uuid)
    for (const [key, v] of pairs) this.claim(key, v, { kind: "convention", uuid })
    this.record({ definition: type.definition, layout: "prefixed", prefix })

    this.logger.debug("Added prefixed convention", {
      operation: "add_prefixed",
      convention: type.definition.name,
      prefix,
      keys: pairs.length,
    })
    return this
  }

  /**
   * Add an unstructured attribute.
   *
   * @throws EncodeError when the value is not JSON-encodable
   * @throws KeyCollisionError when the key is already written, is the
   * manifest key, or lies under an added convention's prefix
   */
  addAttribute(key: string, value: unknown): this {
    this.assertUsable()

    const json = toJsonValue(value)

    this.assertWritable(key, undefined)

    this.claim(key, json, { kind: "attribute" })
    this.logger.trace("Added attribute", { operation: "add_attribute", key })
    return this
  }

  /**
   * Assemble the attributes map: `zarr_conventions` first (only when a
   * convention was added, in the order conventions were first added), then
   * every other key in insertion order.
   *
   * @throws InvalidBuilderConfigurationError when conventions were added but
   * no identifying manifest field is enabled
   */
  build(): Attributes {
    this.assertUsable()

    if (this.added.size > 0 && !hasIdentifyingField(this.fields)) {
      throw new InvalidBuilderConfigurationError(
        "At least one convention identifier (uuid, schema_url, spec_url) must be enabled",
        { context: { fields: { ...this.fields } } },
      )
    }

    const entries = [...this.added.values()].map(({ definition }) =>
      serializeManifestEntry(manifestEntryFromDefinition(definition, this.fields)),
    )

    const out: Attributes = {}
    if (entries.length > 0) out[MANIFEST_KEY] = entries
    for (const [key, value] of this.values) setOwn(out, key, value)

    this.consumed = true
    this.logger.debug("Built attributes", {
      operation: "build",
      conventions: entries.length,
      keys: this.values.size,
    })
    return out
  }

  private assertUsable(): void {
    if (this.consumed) {
      throw new BuilderConsumedError("AttributesBuilder cannot be used after build()")
    }
  }

  private assertIdentifiable(definition: ConventionDefinition): void {
    if (!hasIdentifyingField(this.fields)) {
      throw new InvalidBuilderConfigurationError(
        `Cannot add "${definition.name}": at least one convention identifier (uuid, schema_url, spec_url) must be enabled`,
        { context: { convention: definition.name, fields: { ...this.fields } } },
      )
    }
  }

  private assertSameLayout(definition: ConventionDefinition, layout: LayoutKind): void {
    const previous = this.added.get(definition.uuid)
    if (previous && previous.layout !== layout) {
      throw new RepresentationConflictError(
        `Convention "${definition.name}" was already added in ${previous.layout} form`,
        { context: { convention: definition.name, existing: previous.layout, requested: layout } },
      )
    }
  }

  /**
   * A key is writable for `uuid` (or for a plain attribute when `undefined`)
   * unless it is the manifest key, is owned by something else, or lies under
   * the prefix of another added convention.
   */
  private assertWritable(key: string, uuid: string | undefined): void {
    if (key === MANIFEST_KEY) throw this.collision(key, "the zarr_conventions manifest")

    if (this.values.has(key) && (uuid === undefined || !this.ownedBy(key, uuid))) {
      throw this.collision(key, this.describeOwner(key))
    }

    for (const other of this.added.values()) {
      if (other.definition.uuid === uuid || other.prefix === undefined) continue
      if (inNamespace(key, other.prefix)) {
        throw this.collision(key, `prefix "${other.prefix}" of "${other.definition.name}"`)
      }
    }
  }

  private ownedBy(key: string, uuid: string): boolean {
    const owner = this.owners.get(key)
    return owner?.kind === "convention" && owner.uuid === uuid
  }

  private describeOwner(key: string): string {
    const owner = this.owners.get(key)
    if (owner?.kind !== "convention") return "an attribute"
    const name = this.added.get(owner.uuid)?.definition.name ?? owner.uuid
    return `convention "${name}"`
  }

  private collision(key: string, holder: string): KeyCollisionError {
    return new KeyCollisionError(`Attribute key "${key}" is already used by ${holder}`, {
      context: { key, holder },
    })
  }

  /** Drop every key previously written for a convention. */
  private release(uuid: string): void {
    for (const [key, owner] of this.owners) {
      if (owner.kind === "convention" && owner.uuid === uuid) {
        this.owners.delete(key)
        this.values.delete(key)
      }
    }
  }

  private claim(key: string, value: JsonValue, owner: KeyOwner): void {
    this.values.set(key, value)
    this.owners.set(key, owner)
  }

  /** Map.set on an existing uuid keeps its manifest position. */
  private record(convention: AddedConvention): void {
    this.added.set(convention.definition.uuid, convention)
  }
}
