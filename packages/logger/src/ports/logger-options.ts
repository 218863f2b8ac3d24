import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every adapter: which levels are emitted and whether output
 * is rendered for humans.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. `"info"` suppresses `trace` and `debug`.
   */
  level: LogLevelName

  /**
   * Pretty-print for local development. Leave off in production, where
   * newline-delimited JSON is expected.
   */
  prettify?: boolean
}
