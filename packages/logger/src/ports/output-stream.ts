import type { LogError } from "@inkwell/errors"
import type { LogEvent } from "./log-event"
import type { LogRenderer } from "./renderer"

/**
 * A destination for log events.
 *
 * @remarks
 * - `out` on a disabled stream does nothing.
 * - `out` throws a LogError when delivery fails; the router records it and moves
 *   on to the next stream.
 * - Streams that store raw events ignore the renderer.
 */
export interface OutputStream {
  /** Identifies the stream in failure reports. */
  readonly name: string

  /** Throws when the stream has a precondition that is not met. */
  enable(): void
  disable(): void
  isEnabled(): boolean

  out(event: LogEvent, renderer: LogRenderer): void
}

export type CloseResult = Readonly<{
  /** Pending lines written while closing. */
  written: number
  /** Pending lines dropped while closing. */
  discarded: number
  error?: LogError
}>

/** A stream holding pending output that must be settled once at teardown. */
export interface ClosableOutputStream extends OutputStream {
  /** Never throws; repeated calls return the first result. */
  close(): CloseResult
}

export function isClosable(stream: OutputStream): stream is ClosableOutputStream {
  return "close" in stream && typeof stream.close === "function"
}
