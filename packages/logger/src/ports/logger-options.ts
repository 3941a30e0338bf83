import type { LogLevelName } from "./log-level"

/**
 * Output policy shared by every adapter.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped */
  level: LogLevelName

  /** Human-readable lines for local runs; JSON otherwise */
  prettify?: boolean

  /**
   * Levels of a logged error chain kept before it is cut with `...`.
   * Defaults to the chain serializer's own limit.
   */
  errorDepth?: number
}
