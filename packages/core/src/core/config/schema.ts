import { logLevelNames } from "@zarr-conventions/logger"
import { z } from "zod"

/** Environment variables are read with this prefix, stripped. */
export const ENV_PREFIX = "ZARR_CONVENTIONS_"

const flag = (fallback: boolean) => z.union([z.boolean(), z.stringbool()]).default(fallback)

export const conventionsConfigSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag(false),

  MANIFEST_UUID: flag(true),
  MANIFEST_SCHEMA_URL: flag(true),
  MANIFEST_SPEC_URL: flag(true),
  MANIFEST_NAME: flag(true),
  MANIFEST_DESCRIPTION: flag(true),
})

export type ConventionsConfig = z.output<typeof conventionsConfigSchema>
