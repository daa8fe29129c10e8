export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject

export type JsonObject = { [key: string]: JsonValue }

/**
 * The `attributes` map of a Zarr array or group, already parsed from JSON.
 *
 * @remarks
 * Key order is significant for output but not for lookups.
 */
export type Attributes = JsonObject
