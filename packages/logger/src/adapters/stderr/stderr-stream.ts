import { EventEmitter } from "node:events"
import { toIoError } from "@inkwell/errors"
import type { Diagnostics } from "../../ports/diagnostics"
import type { LogEvent } from "../../ports/log-event"
import type { OutputStream } from "../../ports/output-stream"
import type { LogRenderer } from "../../ports/renderer"
import { NullDiagnostics } from "../null/null-diagnostics"

export type LineWriter = {
  write(chunk: string): unknown
}

export type StderrStreamDeps = {
  /** Defaults to `process.stderr`. */
  stderr?: LineWriter
  diagnostics?: Diagnostics
}

export type StderrStreamOptions = {
  name?: string
  enabled?: boolean
}

/**
 * Renders each event and writes it, newline-terminated, to stderr.
 *
 * A writer that is an event emitter reports failed writes later, as an `error`
 * event. The stream keeps that error and throws it as `IoError` from the next `out`.
 */
export class StderrStream implements OutputStream {
  readonly name: string

  private readonly sink: LineWriter
  private readonly diagnostics: Diagnostics
  private enabled: boolean
  private pendingError: Error | undefined

  constructor(deps: StderrStreamDeps = {}, opts: StderrStreamOptions = {}) {
    this.sink = deps.stderr ?? process.stderr
    this.diagnostics = deps.diagnostics ?? new NullDiagnostics()
    this.name = opts.name ?? "stderr"
    this.enabled = opts.enabled ?? true

    if (this.sink instanceof EventEmitter) {
      this.sink.on("error", (err: Error) => this.onWriteError(err))
    }
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

  out(event: LogEvent, renderer: LogRenderer): void {
    if (!this.enabled) return

    const failed = this.pendingError

    if (failed) {
      this.pendingError = undefined
      throw toIoError(failed, "Failed to write to stderr", { stream: this.name })
    }

    const line = `${renderer.render(event)}\n`

    try {
      this.sink.write(line)
    } catch (err) {
      throw toIoError(err, "Failed to write to stderr", { stream: this.name })
    }
  }

  private onWriteError(err: Error): void {
    this.pendingError = err
    this.diagnostics.error("Failed to write to stderr", { err, stream: this.name })
  }
}
