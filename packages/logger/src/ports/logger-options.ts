import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every adapter: which entries are emitted and whether
 * they are rendered for humans or for log processors.
 */
export type LoggerOptions = {
  /**
   * Entries below this level are dropped.
   *
   * @default "info"
   */
  level: LogLevelName

  /**
   * Human-readable single lines instead of JSON. Meant for local runs.
   */
  prettify?: boolean
}
