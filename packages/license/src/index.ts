export { License, preferredLicenseField, registerLicense } from "./core/license"
export { LicenseBuilder } from "./core/license-builder"
export { InvalidLicenseError } from "./core/license-error"
export { type LicenseField, licenseFields, licenseSchema } from "./core/license-schema"
