import type { ErrorContext } from "../ports/error"
import { LogError } from "./base-error"

type KindOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

/** Invalid template document, option value or deserialized setting. */
export class ConfigError extends LogError<"config"> {
  constructor(message: string, options: KindOptions = {}) {
    super(message, { code: "config", ...options })
  }
}

/** A log line template that lacks the mandatory `%m` placeholder. */
export class FormatError extends LogError<"format"> {
  constructor(message: string, options: KindOptions = {}) {
    super(message, { code: "format", ...options })
  }
}

/** A file output enabled or flushed without a writable path. */
export class PathError extends LogError<"path"> {
  constructor(message: string, options: KindOptions = {}) {
    super(message, { code: "path", ...options })
  }
}

/** A file output operation attempted while the advisory file lock is held. */
export class LockedError extends LogError<"locked"> {
  constructor(message: string, options: KindOptions = {}) {
    super(message, { code: "locked", isRetryable: true, ...options })
  }
}

/** A failed write to stderr or to the log file. */
export class IoError extends LogError<"io"> {
  constructor(message: string, options: KindOptions = {}) {
    super(message, { code: "io", isRetryable: true, ...options })
  }
}
