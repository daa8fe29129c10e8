import { ConventionError, type ConventionErrorOptions, type ErrorCode } from "./base-error"

type ErrorOptions = Omit<ConventionErrorOptions, "code">

/** A `zarr_conventions` value or entry has the wrong shape or no identifying field. */
export class MalformedManifestEntryError extends ConventionError<"malformed_manifest_entry"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "malformed_manifest_entry" })
  }
}

/** Convention data is present but does not decode as the requested type. */
export class DecodeMismatchError extends ConventionError<"decode_mismatch"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "decode_mismatch" })
  }
}

/** Both the nested and the prefixed form of one convention are present. */
export class RepresentationConflictError extends ConventionError<"representation_conflict"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "representation_conflict" })
  }
}

/** A builder write targets a key that is already taken. */
export class KeyCollisionError extends ConventionError<"key_collision"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "key_collision" })
  }
}

/** The builder would write a manifest entry without any identifying field. */
export class InvalidBuilderConfigurationError extends ConventionError<"invalid_builder_configuration"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "invalid_builder_configuration" })
  }
}

/** The convention type does not declare the requested layout. */
export class UnsupportedLayoutError extends ConventionError<"unsupported_layout"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "unsupported_layout" })
  }
}

/** A value could not be turned into JSON for the attributes map. */
export class EncodeError extends ConventionError<"encode_failed"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "encode_failed" })
  }
}

/** A different definition already holds one of the identifiers being registered. */
export class RegistrationConflictError extends ConventionError<"registration_conflict"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "registration_conflict" })
  }
}

export class InvalidConventionDefinitionError extends ConventionError<"invalid_convention_definition"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "invalid_convention_definition" })
  }
}

/** The value handed to the parser is not a JSON object. */
export class InvalidAttributesError extends ConventionError<"invalid_attributes"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "invalid_attributes" })
  }
}

/** The builder was used after a successful `build()`. */
export class BuilderConsumedError extends ConventionError<"builder_consumed"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "builder_consumed", isOperational: false })
  }
}

export class ConfigError extends ConventionError<"invalid_config"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { ...options, code: "invalid_config" })
  }
}

export type ConventionErrorCode =
  | MalformedManifestEntryError["code"]
  | DecodeMismatchError["code"]
  | RepresentationConflictError["code"]
  | KeyCollisionError["code"]
  | InvalidBuilderConfigurationError["code"]
  | UnsupportedLayoutError["code"]
  | EncodeError["code"]
  | RegistrationConflictError["code"]
  | InvalidConventionDefinitionError["code"]
  | InvalidAttributesError["code"]
  | BuilderConsumedError["code"]
  | ConfigError["code"]

/**
 * Type guard for errors raised by this library, optionally narrowed to a code.
 *
 * @example
 * ```ts
 * try {
 *   parser.parse(Proj)
 * } catch (err) {
 *   if (isConventionError(err, "representation_conflict")) {
 *     // pick one layout explicitly
 *   }
 * }
 * ```
 */
export function isConventionError<C extends ErrorCode = ConventionErrorCode>(
  err: unknown,
  code?: C,
): err is ConventionError<C> {
  if (!(err instanceof ConventionError)) return false
  return code === undefined || err.code === code
}
