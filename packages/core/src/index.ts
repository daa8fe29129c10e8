export { EnvSource, type EnvSourceOptions } from "./adapters/config/env-source"
export { ObjectSource } from "./adapters/config/object-source"
export { type ZodConventionOptions, zodConvention } from "./adapters/zod/zod-convention"
export { AttributesBuilder, type AttributesBuilderOptions } from "./core/attributes/attributes-builder"
export {
  AttributesParser,
  type AttributesParserOptions,
  type ResolvedManifestEntry,
  type ValueSchema,
} from "./core/attributes/attributes-parser"
export { Config } from "./core/config/config"
export { createLogger } from "./core/config/create-logger"
export { loadConfig, type LoadConfigOptions, loadConventionsConfig } from "./core/config/load"
export { manifestFieldsFromConfig } from "./core/config/manifest-fields"
export { type ConventionsConfig, conventionsConfigSchema, ENV_PREFIX } from "./core/config/schema"
export {
  definitionIds,
  describeEntry,
  entryIds,
  preferredId,
} from "./core/convention/convention-id"
export { ConventionSet } from "./core/convention/convention-set"
export {
  type ConventionDefinitionInput,
  defineConvention,
  sameDefinition,
} from "./core/convention/define-convention"
export {
  DEFAULT_MANIFEST_FIELDS,
  hasIdentifyingField,
  type ManifestFields,
  manifestEntryFromDefinition,
  parseManifest,
  serializeManifestEntry,
} from "./core/convention/manifest"
export {
  ConventionError,
  type ConventionErrorOptions,
  type ErrorCode,
  type ErrorContext,
  type SerializedError,
  serializeError,
} from "./core/errors/base-error"
export {
  BuilderConsumedError,
  ConfigError,
  type ConventionErrorCode,
  DecodeMismatchError,
  EncodeError,
  InvalidAttributesError,
  InvalidBuilderConfigurationError,
  InvalidConventionDefinitionError,
  isConventionError,
  KeyCollisionError,
  MalformedManifestEntryError,
  RegistrationConflictError,
  RepresentationConflictError,
  UnsupportedLayoutError,
} from "./core/errors/errors"
export { isJsonObject, toJsonObject, toJsonValue } from "./core/json/json"
export { type LayoutKind, supportsNested, supportsPrefixed } from "./core/layout/layout"
export { encodeNested, readNested } from "./core/layout/nested"
export { collectPrefixed, encodePrefixed, prefixedKeys, readPrefixed } from "./core/layout/prefixed"
export { defaultConventionRegistry, registerConventions } from "./core/registry/default-registry"
export {
  InMemoryConventionRegistry,
  type InMemoryConventionRegistryOptions,
} from "./core/registry/in-memory-registry"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/config-source"
export {
  type ConventionDefinition,
  type ConventionId,
  type ConventionIdKind,
  type ConventionLayouts,
  type ConventionType,
  MANIFEST_KEY,
  type ManifestEntry,
  type NestedConventionType,
  type NestedLayout,
  type PrefixedConventionType,
  type PrefixedLayout,
} from "./ports/convention"
export type { Attributes, JsonObject, JsonPrimitive, JsonValue } from "./ports/json"
export type { ConventionRegistry } from "./ports/registry"
