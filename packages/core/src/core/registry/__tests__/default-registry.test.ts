import { canBeEither, mustBeNested } from "../../../tests/conventions"
import { defaultConventionRegistry, registerConventions } from "../default-registry"
import { InMemoryConventionRegistry } from "../in-memory-registry"

describe("registerConventions", () => {
  it("registers types and bare definitions into the given registry", () => {
    const registry = new InMemoryConventionRegistry()

    const returned = registerConventions([mustBeNested, canBeEither.definition], registry)

    expect(returned).toBe(registry)
    expect(registry.definitions().map((d) => d.name)).toEqual(["must_be_nested", "can_be_either"])
  })

  it("is idempotent", () => {
    const registry = new InMemoryConventionRegistry()

    registerConventions([mustBeNested], registry)
    registerConventions([mustBeNested], registry)

    expect(registry.definitions()).toHaveLength(1)
  })

  it("defaults to the process-wide registry", () => {
    registerConventions([mustBeNested])

    expect(defaultConventionRegistry.lookupByUuid(mustBeNested.definition.uuid)).toEqual(
      mustBeNested.definition,
    )
  })
})
