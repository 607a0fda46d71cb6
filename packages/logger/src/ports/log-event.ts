import type { Severity } from "./severity"

/**
 * One log occurrence.
 *
 * @remarks
 * Frozen at creation and shared as-is by every output that receives it.
 */
export type LogEvent = Readonly<{
  severity: Severity
  message: string
  /** When the logging call was made. */
  timestamp: Date
}>

export function createLogEvent(severity: Severity, message: string, timestamp: Date): LogEvent {
  return Object.freeze({
    severity,
    message,
    timestamp: new Date(timestamp.getTime()),
  })
}
