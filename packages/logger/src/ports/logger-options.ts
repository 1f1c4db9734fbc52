import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. Default: "info" */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Keep it off where logs are
   * collected as JSON.
   */
  prettify?: boolean
}
