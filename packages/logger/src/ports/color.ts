export const colorNames = [
  "none",
  "black",
  "blue",
  "cyan",
  "green",
  "gray",
  "magenta",
  "red",
  "white",
  "yellow",
] as const

export type Color = (typeof colorNames)[number]

export function isColor(value: unknown): value is Color {
  return typeof value === "string" && colorNames.some((name) => name === value)
}
