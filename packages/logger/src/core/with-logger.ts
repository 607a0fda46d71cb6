import type { Logger } from "./logger"

/** Runs `fn` and closes the logger once it settles, whether it resolves or rejects. */
export async function withLogger<T>(
  logger: Logger,
  fn: (logger: Logger) => Promise<T>,
): Promise<T> {
  try {
    return await fn(logger)
  } finally {
    logger.close()
  }
}

/** Runs `fn` and closes the logger on return or throw. */
export function withLoggerSync<T>(logger: Logger, fn: (logger: Logger) => T): T {
  try {
    return fn(logger)
  } finally {
    logger.close()
  }
}
