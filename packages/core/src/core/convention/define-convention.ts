import { z } from "zod"
import type { ConventionDefinition } from "../../ports/convention"
import { InvalidConventionDefinitionError } from "../errors/errors"

const definitionSchema = z.object({
  uuid: z.guid(),
  schemaUrl: z.url(),
  specUrl: z.url(),
  name: z.string().min(1),
  description: z.string(),
})

export type ConventionDefinitionInput = z.input<typeof definitionSchema>

/**
 * Validate and freeze a convention's identity.
 *
 * The UUID is stored in lowercase canonical form.
 *
 * @throws InvalidConventionDefinitionError when the UUID or either URL is malformed
 */
export function defineConvention(input: ConventionDefinitionInput): ConventionDefinition {
  const result = definitionSchema.safeParse(input)

  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.map(String).join("."),
      message: i.message,
    }))
    throw new InvalidConventionDefinitionError(
      `Invalid convention definition "${input.name}": ${z.prettifyError(result.error)}`,
      { context: { name: input.name, issues } },
    )
  }

  return Object.freeze({ ...result.data, uuid: result.data.uuid.toLowerCase() })
}

export function sameDefinition(a: ConventionDefinition, b: ConventionDefinition): boolean {
  return (
    a.uuid === b.uuid &&
    a.schemaUrl === b.schemaUrl &&
    a.specUrl === b.specUrl &&
    a.name === b.name &&
    a.description === b.description
  )
}
