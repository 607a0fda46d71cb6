import { type LogError, toLogError } from "@inkwell/errors"
import type { LogEvent } from "../ports/log-event"
import { type CloseResult, isClosable, type OutputStream } from "../ports/output-stream"
import type { LogRenderer } from "../ports/renderer"

export type OutputFailure = {
  /** Name of the stream that failed. */
  stream: string
  error: LogError
}

export type DispatchResult = {
  failures: OutputFailure[]
}

export type StreamCloseResult = CloseResult & { stream: string }

/**
 * Fans each event out to an ordered set of streams.
 *
 * @remarks
 * A stream receives an event only when both the router and the stream are
 * enabled. A throwing stream is recorded and the remaining streams still
 * receive the event.
 */
export class OutputRouter {
  private readonly outputs: OutputStream[] = []
  private enabled = true

  constructor(streams: readonly OutputStream[] = []) {
    for (const stream of streams) this.add(stream)
  }

  /** Appends a stream; adding the same instance twice is a no-op. */
  add(stream: OutputStream): void {
    if (this.outputs.includes(stream)) return

    this.outputs.push(stream)
  }

  /** @returns whether the stream was registered */
  remove(stream: OutputStream): boolean {
    const index = this.outputs.indexOf(stream)

    if (index === -1) return false

    this.outputs.splice(index, 1)

    return true
  }

  streams(): readonly OutputStream[] {
    return [...this.outputs]
  }

  enable(): void {
    this.enabled = true
  }

  disable(): void {
    this.enabled = false
  }

  isEnabled(): boolean {
    return this.enabled
  }

  dispatch(event: LogEvent, renderer: LogRenderer): DispatchResult {
    const failures: OutputFailure[] = []

    if (!this.enabled) return { failures }

    for (const stream of this.outputs) {
      if (!stream.isEnabled()) continue

      try {
        stream.out(event, renderer)
      } catch (err) {
        failures.push({ stream: stream.name, error: toLogError(err) })
      }
    }

    return { failures }
  }

  /** Closes every closable stream, in registration order. */
  close(): StreamCloseResult[] {
    const results: StreamCloseResult[] = []

    for (const stream of this.outputs) {
      if (!isClosable(stream)) continue

      results.push({ stream: stream.name, ...stream.close() })
    }

    return results
  }
}
