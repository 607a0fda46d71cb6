import type { Severity } from "../ports/severity"
import { Logger, type LogResult } from "./logger"

let globalLogger: Logger | undefined

/** The process-wide logger, created with default settings on first use. */
export function getGlobalLogger(): Logger {
  globalLogger ??= new Logger()

  return globalLogger
}

/**
 * Replaces the process-wide logger. The previous one is closed, so its pending
 * file output is settled.
 *
 * @returns the previous logger, if one had been created
 */
export function setGlobalLogger(logger: Logger): Logger | undefined {
  const previous = globalLogger
  globalLogger = logger

  if (previous && previous !== logger) previous.close()

  return previous
}

/** Closes and forgets the process-wide logger. */
export function resetGlobalLogger(): void {
  const previous = globalLogger
  globalLogger = undefined

  previous?.close()
}

function forward(severity: Severity) {
  return (message: string): LogResult => getGlobalLogger().log(severity, message)
}

export const globalLog = {
  debug: forward("debug"),
  info: forward("info"),
  warning: forward("warning"),
  error: forward("error"),
  fatal: forward("fatal"),
} as const
