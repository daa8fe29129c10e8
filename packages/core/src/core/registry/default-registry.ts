import type { ConventionDefinition, ConventionType } from "../../ports/convention"
import type { ConventionRegistry } from "../../ports/registry"
import { InMemoryConventionRegistry } from "./in-memory-registry"

/**
 * Process-wide registry. Convention packages register into it through their
 * `register…()` helpers; nothing is registered on import.
 */
export const defaultConventionRegistry: ConventionRegistry = new InMemoryConventionRegistry()

type Registrable = ConventionDefinition | Pick<ConventionType<unknown>, "definition">

function definitionOf(item: Registrable): ConventionDefinition {
  return "definition" in item ? item.definition : item
}

/**
 * Register convention types (or bare definitions) in one call.
 * Idempotent for identical definitions.
 *
 * @example
 * ```ts
 * registerConventions([License, UnitOfMeasurement])
 * registerConventions([Proj], myRegistry)
 * ```
 */
export function registerConventions(
  items: readonly Registrable[],
  registry: ConventionRegistry = defaultConventionRegistry,
): ConventionRegistry {
  for (const item of items) registry.register(definitionOf(item))
  return registry
}
