import { type ZodType, z } from "zod"
import { EnvSource } from "../../adapters/config/env-source"
import type { IConfig } from "../../ports/config"
import type { ConfigSource } from "../../ports/config-source"
import { ConfigError } from "../errors/errors"
import { Config } from "./config"
import { type ConventionsConfig, conventionsConfigSchema, ENV_PREFIX } from "./schema"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources?: readonly ConfigSource[]
}

/**
 * Merge sources in order (later wins), validate with the schema and keep
 * track of which source supplied each key.
 *
 * @throws ConfigError when validation fails
 */
export function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): IConfig<T> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource({ prefix: ENV_PREFIX })]

  for (const source of resolvedSources) {
    for (const [key, value] of Object.entries(source.load())) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigError(`Configuration validation failed:\n${z.prettifyError(result.error)}`, {
      context: { sources: resolvedSources.map((s) => s.name) },
    })
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) provenance[key] = "default"
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}

/**
 * Load this library's settings, from `ZARR_CONVENTIONS_*` environment
 * variables unless other sources are given.
 *
 * @example
 * ```ts
 * const config = loadConventionsConfig([
 *   new EnvSource({ prefix: ENV_PREFIX }),
 *   new ObjectSource({ MANIFEST_DESCRIPTION: false }),
 * ])
 * const logger = createLogger(config)
 * const builder = AttributesBuilder.fromConfig(config, { logger })
 * ```
 */
export function loadConventionsConfig(
  sources?: readonly ConfigSource[],
): IConfig<ConventionsConfig> {
  return loadConfig({ schema: conventionsConfigSchema, ...(sources && { sources }) })
}
