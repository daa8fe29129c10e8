import type { IConfig } from "../../ports/config"
import type { ManifestFields } from "../convention/manifest"
import type { ConventionsConfig } from "./schema"

export function manifestFieldsFromConfig(config: IConfig<ConventionsConfig>): ManifestFields {
  const v = config.value
  return {
    uuid: v.MANIFEST_UUID,
    schemaUrl: v.MANIFEST_SCHEMA_URL,
    specUrl: v.MANIFEST_SPEC_URL,
    name: v.MANIFEST_NAME,
    description: v.MANIFEST_DESCRIPTION,
  }
}
