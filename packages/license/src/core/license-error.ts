import { ConventionError, type ConventionErrorOptions } from "@zarr-conventions/core"

/** LicenseBuilder produced a license the schema rejects. */
export class InvalidLicenseError extends ConventionError<"invalid_license"> {
  constructor(message: string, options: Omit<ConventionErrorOptions, "code"> = {}) {
    super(message, { ...options, code: "invalid_license" })
  }
}
