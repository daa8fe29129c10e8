export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels, higher is more severe.
 */
export const LogLevels = {
  /** Per-key detail while reading or writing attributes. */
  Trace: 10,
  /** Registry, manifest and builder decisions. */
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]
