import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Adapters must honor these options but are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. Entries below this level are dropped.
   */
  level: LogLevelName

  /**
   * Pretty-print output for humans (local development only).
   */
  prettify?: boolean
}
