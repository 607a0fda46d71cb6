import { format, getUnixTime } from "date-fns"

type Directive = (date: Date) => string

const pattern =
  (token: string): Directive =>
  (date) =>
    format(date, token, { useAdditionalDayOfYearTokens: true })

/**
 * strftime directives, rendered in local time.
 *
 * Directives without a date-fns token are computed directly.
 */
const DIRECTIVES: Readonly<Record<string, Directive>> = {
  Y: pattern("yyyy"),
  y: pattern("yy"),
  m: pattern("MM"),
  b: pattern("MMM"),
  h: pattern("MMM"),
  B: pattern("MMMM"),
  d: pattern("dd"),
  e: (date) => String(date.getDate()).padStart(2, " "),
  j: pattern("DDD"),
  a: pattern("EEE"),
  A: pattern("EEEE"),
  u: pattern("i"),
  w: (date) => String(date.getDay()),
  H: pattern("HH"),
  I: pattern("hh"),
  M: pattern("mm"),
  S: pattern("ss"),
  p: pattern("a"),
  z: pattern("xx"),
  s: (date) => String(getUnixTime(date)),
  F: pattern("yyyy-MM-dd"),
  T: pattern("HH:mm:ss"),
  D: pattern("MM/dd/yy"),
  R: pattern("HH:mm"),
  n: () => "\n",
  t: () => "\t",
  "%": () => "%",
}

type Segment = string | Directive

export type DatetimeRenderer = (date: Date) => string

/**
 * Compiles a strftime-style template into a renderer.
 *
 * Unknown directives are kept verbatim (`%Q` renders as `%Q`) and a trailing
 * lone `%` renders as `%`, so rendering never throws.
 */
export function compileDatetimeFormat(template: string): DatetimeRenderer {
  const segments: Segment[] = []
  let literal = ""

  for (let i = 0; i < template.length; i++) {
    const char = template.charAt(i)

    if (char !== "%" || i === template.length - 1) {
      literal += char
      continue
    }

    const key = template.charAt(i + 1)
    const directive = DIRECTIVES[key]
    i++

    if (!directive) {
      literal += `%${key}`
      continue
    }

    if (literal) segments.push(literal)
    literal = ""
    segments.push(directive)
  }

  if (literal) segments.push(literal)

  return (date) =>
    segments.map((segment) => (typeof segment === "string" ? segment : segment(date))).join("")
}

export function formatDatetime(date: Date, template: string): string {
  return compileDatetimeFormat(template)(date)
}
