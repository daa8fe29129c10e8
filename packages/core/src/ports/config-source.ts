/**
 * A source of raw configuration values.
 *
 * @remarks
 * Sources only load. Validation, coercion and defaults happen in
 * `loadConventionsConfig`. Sources are applied in order; later sources
 * override earlier ones. Returning `undefined` for a key means "not provided".
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance, e.g. "env", "object:overrides".
   */
  readonly name: string

  load(): Record<string, unknown>
}
