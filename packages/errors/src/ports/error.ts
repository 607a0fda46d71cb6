/**
 * Stable, machine-readable error codes raised by the logging packages.
 *
 * - `config`: an invalid template document or option value
 * - `format`: a log line template without the `%m` placeholder
 * - `path`: a file output used without a writable path
 * - `locked`: a file output operation attempted while its advisory lock is held
 * - `io`: a failed write to stderr or to the log file
 * - `unknown`: anything thrown that is not one of the above
 */
export type ErrorCode = "config" | "format" | "path" | "locked" | "io" | "unknown"

/**
 * Contextual metadata attached to errors (paths, template strings, stream names).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface LogFailure extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * `true` if repeating the same operation might succeed.
   *
   * @remarks
   * A locked file output becomes writable once unlocked, and a failed flush keeps
   * its pending lines, so `locked` and `io` failures are retryable.
   */
  readonly isRetryable: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for diagnostics output.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
