/**
 * Structured fields understood by every logger in this repository.
 */
export type LogContext = {
  /** Package or component emitting the log, e.g. "registry". */
  module: string
  /** Operation in progress, e.g. "parse_nested", "add_prefixed". */
  operation: string

  /** Convention name or identifier the entry is about. */
  convention: string
  /** Top-level attribute key. */
  key: string
  /** Attribute key prefix of a prefixed layout. */
  prefix: string
  /** Position of an entry in the `zarr_conventions` manifest. */
  index: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
