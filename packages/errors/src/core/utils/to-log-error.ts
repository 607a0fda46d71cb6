import type { ErrorContext } from "../../ports/error"
import { LogError } from "../base-error"
import { IoError } from "../errors"

/**
 * Convert any thrown value to a LogError.
 *
 * - LogError passes through unchanged
 * - Error instances are wrapped with code "unknown" and kept as the cause
 * - Non-Error values are wrapped with the value in the context
 */
export function toLogError(err: unknown): LogError {
  if (err instanceof LogError) {
    return err
  }

  if (err instanceof Error) {
    return new LogError(err.message, { code: "unknown", cause: err })
  }

  return new LogError(typeof err === "string" ? err : "Unknown error", {
    code: "unknown",
    context: typeof err === "string" ? {} : { value: err },
  })
}

/**
 * Wrap a failure from a write call (fs, stream) in an IoError.
 *
 * LogErrors are passed through so a nested, already classified failure keeps
 * its code.
 */
export function toIoError(err: unknown, message: string, context?: ErrorContext): LogError {
  if (err instanceof LogError) {
    return err
  }

  return new IoError(message, { cause: err, context })
}
