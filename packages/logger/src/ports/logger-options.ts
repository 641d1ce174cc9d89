import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every adapter: which levels are emitted and whether output
 * is rendered for humans.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Leave off in production,
   * where structured JSON lines are expected.
   */
  prettify?: boolean
}
