import type { ConfigSource } from "../../ports/config-source"

export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    name = "object:overrides",
  ) {
    this.name = name
  }

  load(): Record<string, unknown> {
    return { ...this.obj }
  }
}
