import { createNullLogger, type Logger } from "@zarr-conventions/logger"
import type {
  ConventionDefinition,
  ConventionId,
  ManifestEntry,
} from "../../ports/convention"
import type { ConventionRegistry } from "../../ports/registry"
import { entryIds } from "../convention/convention-id"
import { sameDefinition } from "../convention/define-convention"
import { RegistrationConflictError } from "../errors/errors"

export type InMemoryConventionRegistryOptions = {
  logger?: Logger
}

export class InMemoryConventionRegistry implements ConventionRegistry {
  private readonly byUuid = new Map<string, ConventionDefinition>()
  private readonly bySchemaUrl = new Map<string, ConventionDefinition>()
  private readonly bySpecUrl = new Map<string, ConventionDefinition>()
  private readonly ordered: ConventionDefinition[] = []
  private readonly logger: Logger

  constructor(options: InMemoryConventionRegistryOptions = {}) {
    this.logger = (options.logger ?? createNullLogger()).child({ module: "registry" })
  }

  register(definition: ConventionDefinition): void {
    const frozen = Object.freeze({ ...definition, uuid: definition.uuid.toLowerCase() })
    const existing = this.byUuid.get(frozen.uuid)

    if (existing && sameDefinition(existing, frozen)) {
      this.logger.debug("Convention already registered", { convention: frozen.name })
      return
    }

    const clashes: [string, string, ConventionDefinition | undefined][] = [
      ["uuid", frozen.uuid, existing],
      ["schema_url", frozen.schemaUrl, this.bySchemaUrl.get(frozen.schemaUrl)],
      ["spec_url", frozen.specUrl, this.bySpecUrl.get(frozen.specUrl)],
    ]

    for (const [field, value, holder] of clashes) {
      if (holder) {
        throw new RegistrationConflictError(
          `Convention with ${field} ${value} is already registered as "${holder.name}"`,
          { context: { field, value, registered: holder.name, rejected: frozen.name } },
        )
      }
    }

    this.byUuid.set(frozen.uuid, frozen)
    this.bySchemaUrl.set(frozen.schemaUrl, frozen)
    this.bySpecUrl.set(frozen.specUrl, frozen)
    this.ordered.push(frozen)

    this.logger.debug("Convention registered", { convention: frozen.name, uuid: frozen.uuid })
  }

  lookupByUuid(uuid: string): ConventionDefinition | undefined {
    return this.byUuid.get(uuid.toLowerCase())
  }

  lookupBySchemaUrl(url: string): ConventionDefinition | undefined {
    return this.bySchemaUrl.get(url)
  }

  lookupBySpecUrl(url: string): ConventionDefinition | undefined {
    return this.bySpecUrl.get(url)
  }

  lookup(id: ConventionId): ConventionDefinition | undefined {
    switch (id.kind) {
      case "uuid":
        return this.lookupByUuid(id.value)
      case "schema_url":
        return this.lookupBySchemaUrl(id.value)
      case "spec_url":
        return this.lookupBySpecUrl(id.value)
    }
  }

  has(id: ConventionId): boolean {
    return this.lookup(id) !== undefined
  }

  resolve(entry: ManifestEntry): ConventionDefinition | undefined {
    for (const id of entryIds(entry)) {
      const found = this.lookup(id)
      if (found) return found
    }
    return undefined
  }

  definitions(): readonly ConventionDefinition[] {
    return [...this.ordered]
  }
}
