import { type Clock, SystemClock } from "@inkwell/clock"
import { ConfigError } from "@inkwell/errors"
import { BufferStream } from "../adapters/buffer/buffer-stream"
import { FileStream, type FileStreamOptions } from "../adapters/file/file-stream"
import { NullDiagnostics } from "../adapters/null/null-diagnostics"
import { type LineWriter, StderrStream } from "../adapters/stderr/stderr-stream"
import type { Diagnostics } from "../ports/diagnostics"
import { createLogEvent, type LogEvent } from "../ports/log-event"
import type { Severity } from "../ports/severity"
import { DEFAULT_VERBOSITY, isVerbosity, type Verbosity } from "../ports/verbosity"
import { shouldEmit } from "./filtering"
import { type FormatterOptions, LogFormatter } from "./formatter"
import {
  type DispatchResult,
  type OutputFailure,
  OutputRouter,
  type StreamCloseResult,
} from "./output-router"

export type LoggerDeps = {
  /** Timestamps new events. Default: `SystemClock` */
  clock?: Clock
  /** Receives failures that have no caller to return to. Default: `NullDiagnostics` */
  diagnostics?: Diagnostics
  /** Sink of the stderr stream. Default: `process.stderr` */
  stderr?: LineWriter
}

export type LoggerOptions = {
  formatter?: LogFormatter | FormatterOptions
  verbosity?: Verbosity
  filteringEnabled?: boolean
  /** Master switch of the output router. Default: true */
  outputEnabled?: boolean
  stderr?: { enabled?: boolean }
  buffer?: { enabled?: boolean }
  /** `enabled: true` requires a writable `path`. */
  file?: Omit<FileStreamOptions, "name"> & { enabled?: boolean }
}

export type LogResult = {
  /** Whether the event passed filtering and was dispatched. */
  emitted: boolean
  event: LogEvent
  /** Streams that failed to take the event. Always empty when not emitted. */
  failures: OutputFailure[]
}

/**
 * Filters events by severity and routes them to stderr, a log file, an
 * in-memory buffer and any stream added to `output`.
 *
 * @remarks
 * Every operation is synchronous. Events reach each stream in call order.
 *
 * Buffered file output is only written by `flush()`, by auto-flush, or by
 * `close()`. Call `close()` (or run the logger inside `withLogger`) before the
 * process exits.
 *
 * @example
 * ```ts
 * const logger = new Logger({}, { verbosity: "all", file: { enabled: true, path: "app.log" } })
 *
 * logger.debug("connecting")
 * logger.error("connection refused")
 * logger.close()
 * ```
 */
export class Logger {
  readonly formatter: LogFormatter
  readonly output: OutputRouter
  readonly stderr: StderrStream
  readonly file: FileStream
  readonly buffer: BufferStream

  private readonly clock: Clock
  private verbosity: Verbosity
  private filteringEnabled: boolean

  constructor(deps: LoggerDeps = {}, opts: LoggerOptions = {}) {
    this.clock = deps.clock ?? new SystemClock()

    this.formatter =
      opts.formatter instanceof LogFormatter
        ? opts.formatter
        : new LogFormatter(opts.formatter)

    this.verbosity = assertVerbosity(opts.verbosity ?? DEFAULT_VERBOSITY)
    this.filteringEnabled = opts.filteringEnabled ?? true

    const { enabled: fileEnabled = false, ...fileOpts }: NonNullable<LoggerOptions["file"]> =
      opts.file ?? {}

    const diagnostics = deps.diagnostics ?? new NullDiagnostics()

    this.stderr = new StderrStream(
      { stderr: deps.stderr, diagnostics },
      { enabled: opts.stderr?.enabled ?? true },
    )
    this.file = new FileStream({ diagnostics }, fileOpts)
    this.buffer = new BufferStream({ enabled: opts.buffer?.enabled ?? false })

    if (fileEnabled) this.file.enable()

    this.output = new OutputRouter([this.stderr, this.file, this.buffer])

    if (opts.outputEnabled === false) this.output.disable()
  }

  log(severity: Severity, message: string): LogResult {
    const event = createLogEvent(severity, message, this.clock.now())

    if (!shouldEmit(severity, this.verbosity, this.filteringEnabled)) {
      return { emitted: false, event, failures: [] }
    }

    return { emitted: true, event, ...this.output.dispatch(event, this.formatter) }
  }

  debug(message: string): LogResult {
    return this.log("debug", message)
  }

  info(message: string): LogResult {
    return this.log("info", message)
  }

  warning(message: string): LogResult {
    return this.log("warning", message)
  }

  error(message: string): LogResult {
    return this.log("error", message)
  }

  fatal(message: string): LogResult {
    return this.log("fatal", message)
  }

  debugNoFiltering(message: string): LogResult {
    return this.logUnfiltered("debug", message)
  }

  infoNoFiltering(message: string): LogResult {
    return this.logUnfiltered("info", message)
  }

  warningNoFiltering(message: string): LogResult {
    return this.logUnfiltered("warning", message)
  }

  /** Dispatches a prebuilt event as-is, skipping filtering. */
  printLog(event: LogEvent): DispatchResult {
    return this.output.dispatch(event, this.formatter)
  }

  /** Renders an event with the current formatter settings. */
  formatLog(event: LogEvent): string {
    return this.formatter.render(event)
  }

  /** @throws ConfigError for a value outside the known verbosities */
  setVerbosity(verbosity: Verbosity): void {
    this.verbosity = assertVerbosity(verbosity)
  }

  getVerbosity(): Verbosity {
    return this.verbosity
  }

  enableLogFiltering(): void {
    this.filteringEnabled = true
  }

  disableLogFiltering(): void {
    this.filteringEnabled = false
  }

  isFilteringEnabled(): boolean {
    return this.filteringEnabled
  }

  getLogBuffer(): readonly LogEvent[] {
    return this.buffer.getLogBuffer()
  }

  /**
   * Writes pending file output.
   *
   * @returns the number of lines written
   * @throws LockedError, PathError or IoError from the file stream
   */
  flush(): number {
    return this.file.flush()
  }

  /** Settles every closable output once. Never throws. */
  close(): StreamCloseResult[] {
    return this.output.close()
  }

  private logUnfiltered(severity: Severity, message: string): LogResult {
    const event = createLogEvent(severity, message, this.clock.now())

    return { emitted: true, event, ...this.printLog(event) }
  }
}

function assertVerbosity(value: Verbosity): Verbosity {
  if (!isVerbosity(value)) {
    throw new ConfigError(`Unknown verbosity: ${String(value)}`, {
      context: { verbosity: value },
    })
  }

  return value
}
