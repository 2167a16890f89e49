export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels (higher = more severe).
 *
 * @remarks
 * Values match pino's numeric levels so captured output can be mapped back
 * to a {@link LogLevelName}.
 */
export const LogLevels = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

const namesByLevel: ReadonlyMap<number, LogLevelName> = new Map([
  [LogLevels.Trace, "trace"],
  [LogLevels.Debug, "debug"],
  [LogLevels.Info, "info"],
  [LogLevels.Warn, "warn"],
  [LogLevels.Error, "error"],
  [LogLevels.Fatal, "fatal"],
])

/** Name of a numeric level as found in pino output; `undefined` for custom levels. */
export function toLogLevelName(level: number): LogLevelName | undefined {
  return namesByLevel.get(level)
}
