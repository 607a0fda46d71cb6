import pino, {
  type DestinationStream,
  type Level,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { DiagnosticMeta, Diagnostics } from "../../ports/diagnostics"

export type PinoDiagnosticsOptions = {
  /** Minimum level to report. Default: "warn" */
  level?: Level
  /** Bindings added to every entry. Default: `{ component: "inkwell" }` */
  bindings?: Record<string, unknown>
  /** Defaults to pino's stdout destination. */
  destination?: DestinationStream
}

/**
 * Reports the library's own failures as structured pino entries.
 *
 * `meta.err` goes through pino-std-serializers' `errWithCause`, so LogError
 * cause chains survive serialization.
 */
export class PinoDiagnostics implements Diagnostics {
  protected readonly logger: PinoLoggerBase

  constructor(opts: PinoDiagnosticsOptions = {}, base?: PinoLoggerBase) {
    this.logger = this.init(opts, base)
  }

  private init(opts: PinoDiagnosticsOptions, base?: PinoLoggerBase): PinoLoggerBase {
    const bindings = opts.bindings ?? { component: "inkwell" }

    if (base) return base.child(bindings)

    const pinoOpts: PinoOptions = {
      level: opts.level ?? "warn",
      serializers: { err: errWithCause },
    }

    const root = opts.destination ? pino(pinoOpts, opts.destination) : pino(pinoOpts)

    return root.child(bindings)
  }

  warn(message: string, meta: DiagnosticMeta = {}): void {
    this.logger.warn(meta, message)
  }

  error(message: string, meta: DiagnosticMeta = {}): void {
    this.logger.error(meta, message)
  }
}

export function createPinoDiagnostics(opts: PinoDiagnosticsOptions = {}): Diagnostics {
  return new PinoDiagnostics(opts)
}
