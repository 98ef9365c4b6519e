import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Options define policy (which levels are emitted, whether output is
 * rendered for humans). Adapters decide how to honor them.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Entries below this level are dropped.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development.
   * Ignored when an explicit destination stream is supplied.
   */
  prettify?: boolean
}
