import type { LogEvent } from "../../ports/log-event"
import type { OutputStream } from "../../ports/output-stream"
import type { LogRenderer } from "../../ports/renderer"

export type BufferStreamOptions = {
  name?: string
  enabled?: boolean
}

/**
 * Keeps raw events in memory, in call order, until cleared.
 *
 * @example
 * ```ts
 * const buffer = new BufferStream({ enabled: true })
 * logger.output.add(buffer)
 * logger.info("ready")
 * buffer.getLogBuffer()[0]?.message // "ready"
 * ```
 */
export class BufferStream implements OutputStream {
  readonly name: string

  private enabled: boolean
  private readonly events: LogEvent[] = []

  constructor(opts: BufferStreamOptions = {}) {
    this.name = opts.name ?? "buffer"
    this.enabled = opts.enabled ?? false
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

  out(event: LogEvent, _renderer: LogRenderer): void {
    if (!this.enabled) return

    this.events.push(event)
  }

  /** A live, read-only view of the stored events. */
  getLogBuffer(): readonly LogEvent[] {
    return this.events
  }

  clear(): void {
    this.events.length = 0
  }
}
