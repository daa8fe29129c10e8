import { ConventionError } from "../base-error"
import {
  BuilderConsumedError,
  ConfigError,
  DecodeMismatchError,
  EncodeError,
  InvalidAttributesError,
  InvalidBuilderConfigurationError,
  InvalidConventionDefinitionError,
  isConventionError,
  KeyCollisionError,
  MalformedManifestEntryError,
  RegistrationConflictError,
  RepresentationConflictError,
  UnsupportedLayoutError,
} from "../errors"

describe("error classes", () => {
  it.each([
    [new MalformedManifestEntryError("m"), "MalformedManifestEntryError", "malformed_manifest_entry"],
    [new DecodeMismatchError("m"), "DecodeMismatchError", "decode_mismatch"],
    [new RepresentationConflictError("m"), "RepresentationConflictError", "representation_conflict"],
    [new KeyCollisionError("m"), "KeyCollisionError", "key_collision"],
    [
      new InvalidBuilderConfigurationError("m"),
      "InvalidBuilderConfigurationError",
      "invalid_builder_configuration",
    ],
    [new UnsupportedLayoutError("m"), "UnsupportedLayoutError", "unsupported_layout"],
    [new EncodeError("m"), "EncodeError", "encode_failed"],
    [new RegistrationConflictError("m"), "RegistrationConflictError", "registration_conflict"],
    [
      new InvalidConventionDefinitionError("m"),
      "InvalidConventionDefinitionError",
      "invalid_convention_definition",
    ],
    [new InvalidAttributesError("m"), "InvalidAttributesError", "invalid_attributes"],
    [new BuilderConsumedError("m"), "BuilderConsumedError", "builder_consumed"],
    [new ConfigError("m"), "ConfigError", "invalid_config"],
  ])("%s has name %s and code %s", (err, name, code) => {
    expect(err).toBeInstanceOf(ConventionError)
    expect(err.name).toBe(name)
    expect(err.code).toBe(code)
  })

  it("marks builder misuse as non-operational", () => {
    expect(new BuilderConsumedError("m").isOperational).toBe(false)
    expect(new KeyCollisionError("m").isOperational).toBe(true)
  })
})

describe("isConventionError", () => {
  it("accepts library errors and rejects everything else", () => {
    expect(isConventionError(new KeyCollisionError("m"))).toBe(true)
    expect(isConventionError(new Error("m"))).toBe(false)
    expect(isConventionError("key_collision")).toBe(false)
  })

  it("narrows by code", () => {
    const err: unknown = new DecodeMismatchError("m", { context: { key: "nested" } })

    expect(isConventionError(err, "decode_mismatch")).toBe(true)
    expect(isConventionError(err, "key_collision")).toBe(false)

    if (isConventionError(err, "decode_mismatch")) {
      expect(err.context.key).toBe("nested")
    }
  })
})
