import { compileDatetimeFormat, formatDatetime } from "../datetime"

// 2024-01-02 03:04:05 local time, a Tuesday
const at = new Date(2024, 0, 2, 3, 4, 5)

describe("formatDatetime", () => {
  it("renders the default template", () => {
    expect(formatDatetime(at, "%Y-%m-%d %H:%M:%S")).toBe("2024-01-02 03:04:05")
  })

  it.each([
    ["%y", "24"],
    ["%b", "Jan"],
    ["%h", "Jan"],
    ["%B", "January"],
    ["%e", " 2"],
    ["%j", "002"],
    ["%a", "Tue"],
    ["%A", "Tuesday"],
    ["%u", "2"],
    ["%w", "2"],
    ["%I", "03"],
    ["%p", "AM"],
    ["%F", "2024-01-02"],
    ["%T", "03:04:05"],
    ["%D", "01/02/24"],
    ["%R", "03:04"],
    ["%n", "\n"],
    ["%t", "\t"],
    ["%%", "%"],
  ])("renders %s", (template, expected) => {
    expect(formatDatetime(at, template)).toBe(expected)
  })

  it("renders %s as unix seconds", () => {
    expect(formatDatetime(at, "%s")).toBe(String(Math.floor(at.getTime() / 1000)))
  })

  it("keeps unknown directives verbatim", () => {
    expect(formatDatetime(at, "%Q at %H")).toBe("%Q at 03")
  })

  it("keeps a trailing lone percent sign", () => {
    expect(formatDatetime(at, "%H%")).toBe("03%")
  })

  it("copies literal text around directives", () => {
    expect(formatDatetime(at, "on %d/%m at noon")).toBe("on 02/01 at noon")
  })

  it("compiles once and renders many dates", () => {
    const render = compileDatetimeFormat("%H:%M")

    expect(render(at)).toBe("03:04")
    expect(render(new Date(2024, 5, 30, 23, 59, 0))).toBe("23:59")
  })
})
