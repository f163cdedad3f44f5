import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Keep it off in production, where
   * one JSON object per line is expected.
   */
  prettify: boolean
}
