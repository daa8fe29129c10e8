import { z } from "zod"

/**
 * Ways of identifying a license, most preferred first.
 */
export const licenseFields = ["spdx", "url", "text", "file", "path"] as const

export type LicenseField = (typeof licenseFields)[number]

export const licenseSchema = z
  .object({
    /** SPDX license identifier. Should not be a multi-license expression. */
    spdx: z.string().optional(),
    /** URL of the full license text. */
    url: z.url().optional(),
    /** Full license text. */
    text: z.string().optional(),
    /** Relative path to an object holding the license text. */
    file: z.string().optional(),
    /** Relative path to a Zarr node whose license also applies here. */
    path: z.string().optional(),
  })
  .refine((l) => licenseFields.some((field) => l[field] !== undefined), {
    error: "At least one of spdx, url, text, file or path must be set",
  })

export type LicenseValue = z.output<typeof licenseSchema>
