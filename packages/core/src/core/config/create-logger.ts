import { type Logger, PinoLogger, type PinoLoggerOptions } from "@zarr-conventions/logger"
import type { IConfig } from "../../ports/config"
import type { ConventionsConfig } from "./schema"

export function createLogger(
  config: IConfig<ConventionsConfig>,
  overrides: Pick<PinoLoggerOptions, "destination"> = {},
): Logger {
  return new PinoLogger({
    level: config.value.LOG_LEVEL,
    prettify: config.value.LOG_PRETTY,
    ...overrides,
  })
}
