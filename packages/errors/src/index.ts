export {
  LogError,
  type LogErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { ConfigError, FormatError, IoError, LockedError, PathError } from "./core/errors"
export { hasErrorCode, isLogError } from "./core/utils/is-log-error"
export { toIoError, toLogError } from "./core/utils/to-log-error"
export type { ErrorCode, ErrorContext, LogFailure, SerializedError } from "./ports/error"
