import type { LogEvent } from "./log-event"

/** Turns an event into one display line (without a trailing newline). */
export interface LogRenderer {
  render(event: LogEvent): string
}
