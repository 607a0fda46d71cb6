/**
 * Fields attached to a diagnostic entry.
 *
 * `err` is serialized with its cause chain by adapters that support it.
 */
export type DiagnosticMeta = {
  err?: unknown
  stream?: string
  path?: string
} & Record<string, unknown>

/**
 * Where the library reports failures it has no caller to return them to, such
 * as a file output that cannot write its pending lines while being closed.
 */
export interface Diagnostics {
  warn(message: string, meta?: DiagnosticMeta): void
  error(message: string, meta?: DiagnosticMeta): void
}
