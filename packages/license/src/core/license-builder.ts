import { z } from "zod"
import { InvalidLicenseError } from "./license-error"
import { type LicenseField, licenseFields, licenseSchema, type LicenseValue } from "./license-schema"

/**
 * Fluent construction of a license.
 *
 * At least one field must be set; setting only one is recommended. In order
 * of preference: `spdx > url > text > file > path`.
 *
 * @example
 * ```ts
 * const license = new LicenseBuilder()
 *   .spdx("MIT")
 *   .url("https://opensource.org/license/mit")
 *   .short()
 *   .build() // { spdx: "MIT" }
 * ```
 */
export class LicenseBuilder {
  private readonly fields: Partial<Record<LicenseField, string>> = {}
  private shortForm = false

  /** Keep only the most preferred field on build. */
  short(enable = true): this {
    this.shortForm = enable
    return this
  }

  spdx(identifier: string): this {
    this.fields.spdx = identifier
    return this
  }

  url(url: string): this {
    this.fields.url = url
    return this
  }

  text(text: string): this {
    this.fields.text = text
    return this
  }

  file(file: string): this {
    this.fields.file = file
    return this
  }

  path(path: string): this {
    this.fields.path = path
    return this
  }

  /**
   * @throws InvalidLicenseError when no field is set or the URL is not absolute
   */
  build(): LicenseValue {
    const keep = this.shortForm
      ? licenseFields.filter((f) => this.fields[f] !== undefined).slice(0, 1)
      : licenseFields

    const candidate: Partial<Record<LicenseField, string>> = {}
    for (const field of keep) {
      const value = this.fields[field]
      if (value !== undefined) candidate[field] = value
    }

    const result = licenseSchema.safeParse(candidate)
    if (!result.success) {
      throw new InvalidLicenseError(`Invalid license: ${z.prettifyError(result.error)}`, {
        context: { fields: Object.keys(candidate) },
      })
    }
    return result.data
  }
}
