/**
 * Validated configuration with provenance.
 *
 * @typeParam T - Shape of the configuration object, inferred from its zod schema.
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  /**
   * Name of the source that provided the final value for a key,
   * or "default" when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value, deduplicated. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   * Useful for detecting typos and stale settings.
   */
  unknownKeys(): string[]
}
