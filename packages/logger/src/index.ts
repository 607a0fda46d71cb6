export {
  BufferStream,
  type BufferStreamOptions,
} from "./adapters/buffer/buffer-stream"
export {
  DEFAULT_MAX_BUFFER_SIZE,
  FileStream,
  type FileStreamDeps,
  type FileStreamOptions,
} from "./adapters/file/file-stream"
export { createNullDiagnostics, NullDiagnostics } from "./adapters/null/null-diagnostics"
export {
  createPinoDiagnostics,
  PinoDiagnostics,
  type PinoDiagnosticsOptions,
} from "./adapters/pino/pino-diagnostics"
export {
  type LineWriter,
  StderrStream,
  type StderrStreamDeps,
  type StderrStreamOptions,
} from "./adapters/stderr/stderr-stream"
export { ANSI_COLOR_CODES, ANSI_RESET, colorText } from "./core/colors"
export { compileDatetimeFormat, type DatetimeRenderer, formatDatetime } from "./core/datetime"
export { shouldEmit } from "./core/filtering"
export {
  defaultFormatterConfig,
  type FormatterConfig,
  type FormatterOptions,
  LogFormatter,
  MESSAGE_PLACEHOLDER,
} from "./core/formatter"
export {
  getGlobalLogger,
  globalLog,
  resetGlobalLogger,
  setGlobalLogger,
} from "./core/global-logger"
export {
  Logger,
  type LoggerDeps,
  type LoggerOptions,
  type LogResult,
} from "./core/logger"
export {
  type DispatchResult,
  type OutputFailure,
  OutputRouter,
  type StreamCloseResult,
} from "./core/output-router"
export { withLogger, withLoggerSync } from "./core/with-logger"
export * from "./ports/color"
export type { DiagnosticMeta, Diagnostics } from "./ports/diagnostics"
export * from "./ports/log-event"
export * from "./ports/on-drop-policy"
export * from "./ports/output-stream"
export type { LogRenderer } from "./ports/renderer"
export * from "./ports/severity"
export * from "./ports/verbosity"
