import type { DiagnosticMeta, Diagnostics } from "../../ports/diagnostics"

export class NullDiagnostics implements Diagnostics {
  warn(_message: string, _meta?: DiagnosticMeta): void {}

  error(_message: string, _meta?: DiagnosticMeta): void {}
}

export function createNullDiagnostics(): Diagnostics {
  return new NullDiagnostics()
}
