import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One emitted record: its level and the structured fields logged with it. */
export type CapturedLog = {
  level: LogLevelName
  payload: Record<string, unknown>
}

/**
 * Plugs a logger adapter into the shared contract suite. `read` returns what
 * the logger emitted since the last `clear`, so the suite can check the
 * context fields, such as `module` and `convention`, that child loggers attach.
 */
export type LoggerHarness = {
  name: string
  make: (opts?: { level?: LogLevelName }) => {
    logger: Logger
    read: () => CapturedLog[]
    clear: () => void
  }
}
