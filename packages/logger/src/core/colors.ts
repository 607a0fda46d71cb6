import type { Color } from "../ports/color"

export const ANSI_RESET = "\x1b[0m"

/** SGR foreground codes. `none` has no code and leaves text untouched. */
export const ANSI_COLOR_CODES: Readonly<Record<Color, string>> = {
  none: "",
  black: "\x1b[30m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  gray: "\x1b[90m",
  magenta: "\x1b[35m",
  red: "\x1b[31m",
  white: "\x1b[37m",
  yellow: "\x1b[33m",
}

/**
 * Wraps text in the escape sequence of a color and a reset.
 *
 * @example
 * ```ts
 * colorText("ERR", "red") // "\x1b[31mERR\x1b[0m"
 * ```
 */
export function colorText(text: string, color: Color): string {
  if (color === "none") return text

  return `${ANSI_COLOR_CODES[color]}${text}${ANSI_RESET}`
}
