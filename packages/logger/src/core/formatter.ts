import { ConfigError, FormatError } from "@inkwell/errors"
import { type Color, isColor } from "../ports/color"
import type { LogEvent } from "../ports/log-event"
import type { LogRenderer } from "../ports/renderer"
import { type Severity, severityNames } from "../ports/severity"
import { colorText } from "./colors"
import { compileDatetimeFormat, type DatetimeRenderer } from "./datetime"

export const MESSAGE_PLACEHOLDER = "%m"

/**
 * Everything that decides how an event is rendered.
 *
 * @remarks
 * `logFormat` placeholders:
 * - `%m`: the message (mandatory)
 * - `%h`: the severity header, colored when header color is enabled
 * - `%d`: the event timestamp, formatted with `datetimeFormat` (strftime directives)
 *
 * `%` followed by any other character renders that character, so `%%` is a
 * literal percent sign.
 */
export type FormatterConfig = {
  headers: Record<Severity, string>
  colors: Record<Severity, Color>
  headerColorEnabled: boolean
  logFormat: string
  datetimeFormat: string
}

export type FormatterOptions = Partial<
  Omit<FormatterConfig, "headers" | "colors"> & {
    headers: Partial<Record<Severity, string>>
    colors: Partial<Record<Severity, Color>>
  }
>

export function defaultFormatterConfig(): FormatterConfig {
  return {
    headers: {
      debug: "DBG",
      info: "INF",
      warning: "WAR",
      error: "ERR",
      fatal: "FATAL",
    },
    colors: {
      debug: "blue",
      info: "green",
      warning: "yellow",
      error: "red",
      fatal: "magenta",
    },
    headerColorEnabled: true,
    logFormat: "[%h] %m",
    datetimeFormat: "%Y-%m-%d %H:%M:%S",
  }
}

export class LogFormatter implements LogRenderer {
  private readonly headers: Record<Severity, string>
  private readonly colors: Record<Severity, Color>
  private headerColorEnabled: boolean
  private logFormat: string
  private datetimeFormat: string
  private renderDatetime: DatetimeRenderer

  constructor(opts: FormatterOptions = {}) {
    const defaults = defaultFormatterConfig()
    const logFormat = opts.logFormat ?? defaults.logFormat

    assertLogFormat(logFormat)

    for (const severity of severityNames) {
      const color = opts.colors?.[severity]
      if (color !== undefined) assertColor(severity, color)
    }

    this.headers = { ...defaults.headers, ...opts.headers }
    this.colors = { ...defaults.colors, ...opts.colors }
    this.headerColorEnabled = opts.headerColorEnabled ?? defaults.headerColorEnabled
    this.logFormat = logFormat
    this.datetimeFormat = opts.datetimeFormat ?? defaults.datetimeFormat
    this.renderDatetime = compileDatetimeFormat(this.datetimeFormat)
  }

  render(event: LogEvent): string {
    const template = this.logFormat
    const header = this.renderHeader(event.severity)
    const datetime = template.includes("%d") ? this.renderDatetime(event.timestamp) : ""

    let line = ""

    for (let i = 0; i < template.length; i++) {
      const char = template.charAt(i)

      if (char !== "%") {
        line += char
        continue
      }

      if (i === template.length - 1) break

      i++
      const key = template.charAt(i)

      switch (key) {
        case "h":
          line += header
          break
        case "d":
          line += datetime
          break
        case "m":
          line += event.message
          break
        default:
          line += key
      }
    }

    return line
  }

  renderHeader(severity: Severity): string {
    const header = this.headers[severity]

    return this.headerColorEnabled ? colorText(header, this.colors[severity]) : header
  }

  /**
   * Replaces the log line template.
   *
   * @throws FormatError when the template lacks `%m`; the previous template is kept.
   */
  setLogFormat(template: string): void {
    assertLogFormat(template)
    this.logFormat = template
  }

  getLogFormat(): string {
    return this.logFormat
  }

  /** Accepts any text; unknown directives render verbatim. */
  setDatetimeFormat(template: string): void {
    this.renderDatetime = compileDatetimeFormat(template)
    this.datetimeFormat = template
  }

  getDatetimeFormat(): string {
    return this.datetimeFormat
  }

  setHeader(severity: Severity, header: string): void {
    this.headers[severity] = header
  }

  getHeader(severity: Severity): string {
    return this.headers[severity]
  }

  /** @throws ConfigError for a value outside the color table */
  setColor(severity: Severity, color: Color): void {
    assertColor(severity, color)

    this.colors[severity] = color
  }

  getColor(severity: Severity): Color {
    return this.colors[severity]
  }

  enableHeaderColor(): void {
    this.headerColorEnabled = true
  }

  disableHeaderColor(): void {
    this.headerColorEnabled = false
  }

  isHeaderColorEnabled(): boolean {
    return this.headerColorEnabled
  }

  /** A detached copy of the current settings. */
  config(): FormatterConfig {
    return {
      headers: { ...this.headers },
      colors: { ...this.colors },
      headerColorEnabled: this.headerColorEnabled,
      logFormat: this.logFormat,
      datetimeFormat: this.datetimeFormat,
    }
  }
}

function assertLogFormat(template: string): void {
  if (!template.includes(MESSAGE_PLACEHOLDER)) {
    throw new FormatError("Expected a message placeholder (%m) in the log format", {
      context: { logFormat: template },
    })
  }
}

function assertColor(severity: Severity, color: Color): void {
  if (!isColor(color)) {
    throw new ConfigError(`Unknown color: ${String(color)}`, {
      context: { severity, color },
    })
  }
}
