import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters honor them
 * however suits their backend.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Example: "info" suppresses "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print output for humans instead of one JSON object per line.
   * Intended for local development.
   */
  prettify?: boolean
}
