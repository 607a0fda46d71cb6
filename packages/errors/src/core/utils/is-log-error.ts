import type { ErrorCode, LogFailure } from "../../ports/error"

const ERROR_CODES: ReadonlySet<string> = new Set<ErrorCode>([
  "config",
  "format",
  "path",
  "locked",
  "io",
  "unknown",
])

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard for errors raised by the logging packages, including ones created
 * by another copy of `@inkwell/errors` (where `instanceof` would fail).
 *
 * @example
 * ```ts
 * const result = logger.error("disk full")
 * for (const { error } of result.failures) {
 *   if (isLogError(error) && error.isRetryable) retryLater()
 * }
 * ```
 */
export function isLogError(e: unknown): e is LogFailure {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    ERROR_CODES.has(e.code) &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}

/** Narrows to a log error carrying the given code. */
export function hasErrorCode<C extends ErrorCode>(
  e: unknown,
  code: C,
): e is LogFailure & { readonly code: C } {
  return isLogError(e) && e.code === code
}
