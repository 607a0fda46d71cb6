import { appendFileSync, closeSync, openSync } from "node:fs"
import {
  ConfigError,
  type LogError,
  LockedError,
  PathError,
  toIoError,
  toLogError,
} from "@inkwell/errors"
import type { Diagnostics } from "../../ports/diagnostics"
import type { LogEvent } from "../../ports/log-event"
import {
  DEFAULT_ON_DROP_POLICY,
  isOnDropPolicy,
  type OnDropPolicy,
} from "../../ports/on-drop-policy"
import type { ClosableOutputStream, CloseResult } from "../../ports/output-stream"
import type { LogRenderer } from "../../ports/renderer"
import { NullDiagnostics } from "../null/null-diagnostics"

export const DEFAULT_MAX_BUFFER_SIZE = 128

export type FileStreamDeps = {
  diagnostics?: Diagnostics
}

export type FileStreamOptions = {
  name?: string
  /** Validated as by `setPath`. */
  path?: string
  /** `null` disables auto-flush. Default: 128 */
  maxBufferSize?: number | null
  onDropPolicy?: OnDropPolicy
}

/**
 * Buffers rendered lines and appends them to a log file in batches.
 *
 * @remarks
 * - Disabled until `enable()`, which requires a writable path.
 * - `out` only buffers; the file is written by `flush()`, by auto-flush once the
 *   buffer holds `maxBufferSize` lines, and by `close()`.
 * - The lock is an advisory flag. While it is held `out` and `flush` throw
 *   `LockedError` instead of waiting.
 * - A failed flush keeps the buffer, so calling `flush()` again retries the same lines.
 */
export class FileStream implements ClosableOutputStream {
  readonly name: string

  private readonly diagnostics: Diagnostics
  private enabled = false
  private locked = false
  private path: string | undefined
  private maxBufferSize: number | null
  private onDropPolicy: OnDropPolicy
  private lines: string[] = []
  private closeResult: CloseResult | undefined

  constructor(deps: FileStreamDeps = {}, opts: FileStreamOptions = {}) {
    this.diagnostics = deps.diagnostics ?? new NullDiagnostics()
    this.name = opts.name ?? "file"
    this.maxBufferSize = validateMaxBufferSize(
      opts.maxBufferSize === undefined ? DEFAULT_MAX_BUFFER_SIZE : opts.maxBufferSize,
    )
    this.onDropPolicy = opts.onDropPolicy ?? DEFAULT_ON_DROP_POLICY

    if (opts.path !== undefined) this.setPath(opts.path)
  }

  /**
   * Sets the log file, creating it when missing. Existing content is kept.
   *
   * @throws PathError when the file cannot be opened for appending; the previous
   * path is kept.
   */
  setPath(path: string): void {
    if (!path) {
      throw new PathError("Log file path must not be empty", { context: { stream: this.name } })
    }

    let fd: number | undefined

    try {
      fd = openSync(path, "a")
    } catch (err) {
      throw new PathError(`Log file is not writable: ${path}`, {
        cause: err,
        context: { stream: this.name, path },
      })
    } finally {
      if (fd !== undefined) closeSync(fd)
    }

    this.path = path
  }

  getPath(): string | undefined {
    return this.path
  }

  /** @throws PathError when no path is set or the file is no longer writable. */
  enable(): void {
    if (this.enabled) return

    if (this.path === undefined) {
      throw new PathError("Set a log file path before enabling file output", {
        context: { stream: this.name },
      })
    }

    this.setPath(this.path)
    this.enabled = true
    this.closeResult = undefined
  }

  disable(): void {
    this.enabled = false
  }

  isEnabled(): boolean {
    return this.enabled
  }

  out(event: LogEvent, renderer: LogRenderer): void {
    if (!this.enabled) return

    if (this.locked) {
      throw new LockedError("Log file is locked", {
        context: { stream: this.name, path: this.path },
      })
    }

    this.lines.push(renderer.render(event))

    if (this.maxBufferSize !== null && this.lines.length >= this.maxBufferSize) {
      this.flush()
    }
  }

  /**
   * Appends every pending line to the log file and clears the buffer.
   *
   * @returns the number of lines written
   * @throws LockedError while locked, PathError without a path, IoError when the
   * write fails (pending lines are kept)
   */
  flush(): number {
    if (this.locked) {
      throw new LockedError("Log file is locked", {
        context: { stream: this.name, path: this.path },
      })
    }

    return this.writePending()
  }

  /**
   * Settles pending lines once, honoring the drop policy when locked:
   * unlocked or `ignore-log-file-lock` writes them, `discard-log-buffer` drops them.
   *
   * Leaves the stream disabled. Failures are returned and reported to diagnostics.
   */
  close(): CloseResult {
    if (this.closeResult) return this.closeResult

    const pending = this.lines.length
    let result: CloseResult = { written: 0, discarded: 0 }

    if (pending > 0 && this.locked && this.onDropPolicy === "discard-log-buffer") {
      this.lines = []
      result = { written: 0, discarded: pending }

      this.diagnostics.warn("Discarded buffered log lines of a locked log file", {
        stream: this.name,
        path: this.path,
        discarded: pending,
      })
    } else if (pending > 0) {
      result = this.writeOnClose(pending)
    }

    this.enabled = false
    this.closeResult = result

    return result
  }

  lockFile(): void {
    this.locked = true
  }

  unlockFile(): void {
    this.locked = false
  }

  isLocked(): boolean {
    return this.locked
  }

  /**
   * Sets the auto-flush threshold; `null` leaves the buffer to grow until `flush()`.
   *
   * @throws ConfigError unless `size` is a positive integer or null
   */
  setMaxBufferSize(size: number | null): void {
    this.maxBufferSize = validateMaxBufferSize(size)
  }

  getMaxBufferSize(): number | null {
    return this.maxBufferSize
  }

  /** @throws ConfigError for a value outside the known policies */
  setOnDropPolicy(policy: OnDropPolicy): void {
    if (!isOnDropPolicy(policy)) {
      throw new ConfigError(`Unknown on-drop policy: ${String(policy)}`, {
        context: { onDropPolicy: policy },
      })
    }

    this.onDropPolicy = policy
  }

  getOnDropPolicy(): OnDropPolicy {
    return this.onDropPolicy
  }

  /** Lines rendered but not yet written. */
  pendingLines(): readonly string[] {
    return this.lines
  }

  private writeOnClose(pending: number): CloseResult {
    try {
      this.writePending()
      return { written: pending, discarded: 0 }
    } catch (err) {
      const error: LogError = toLogError(err)
      this.lines = []

      this.diagnostics.error("Failed to write buffered log lines on close", {
        err: error,
        stream: this.name,
        path: this.path,
        discarded: pending,
      })

      return { written: 0, discarded: pending, error }
    }
  }

  private writePending(): number {
    if (this.lines.length === 0) return 0

    if (this.path === undefined) {
      throw new PathError("No log file path set", { context: { stream: this.name } })
    }

    const count = this.lines.length
    const chunk = this.lines.map((line) => `${line}\n`).join("")

    try {
      appendFileSync(this.path, chunk, "utf8")
    } catch (err) {
      throw toIoError(err, "Failed to write log buffer to file", {
        stream: this.name,
        path: this.path,
      })
    }

    this.lines = []

    return count
  }
}

function validateMaxBufferSize(size: number | null): number | null {
  if (size === null) return null

  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigError("Max buffer size must be a positive integer or null", {
      context: { maxBufferSize: size },
    })
  }

  return size
}
