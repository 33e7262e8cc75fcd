import { StringSink } from "../../../adapters/sinks/string-sink"
import type { TextSink } from "../../../ports/text-sink"
import { TemplateValue } from "../../template-value"
import { renderValue, streamValue } from "../write-value"

function render(value: unknown): string {
  const sink = new StringSink()
  renderValue(sink, value)
  return sink.toString()
}

describe("renderValue", () => {
  it.each([
    [null, "null"],
    [undefined, "undefined"],
    [42, "42"],
    [true, "true"],
    [10n, "10"],
    ["text", "text"],
    [[1, 2], "1,2"],
  ])("renders %o as %s", (value, expected) => {
    expect(render(value)).toBe(expected)
  })

  it("uses an object's toString", () => {
    expect(render({ toString: () => "custom" })).toBe("custom")
  })

  it("renders what a lazy value returns", () => {
    expect(render(() => "later")).toBe("later")
    expect(render(() => null)).toBe("null")
    expect(render(() => () => 7)).toBe("7")
  })

  it("calls a lazy value on every render", () => {
    const lazy = vi.fn(() => "x")

    render(lazy)
    render(lazy)

    expect(lazy).toHaveBeenCalledTimes(2)
  })

  it("hands the sink to writer values", () => {
    expect(render((sink: TextSink) => sink.write("written"))).toBe("written")
  })

  it("renders nested templates through their toString", () => {
    const inner = new TemplateValue([1], ["(", ")"])
    const toString = vi.spyOn(inner, "toString")
    const writeTo = vi.spyOn(inner, "writeTo")

    expect(render(inner)).toBe("(1)")
    expect(toString).toHaveBeenCalledTimes(1)
    expect(writeTo).not.toHaveBeenCalled()
  })
})

describe("streamValue", () => {
  it("streams nested templates into the same sink", () => {
    const inner = new TemplateValue([1], ["(", ")"])
    const toString = vi.spyOn(inner, "toString")
    const sink = new StringSink()

    streamValue(sink, inner)

    expect(sink.toString()).toBe("(1)")
    expect(toString).not.toHaveBeenCalled()
  })

  it("streams a template returned by a lazy value", () => {
    const inner = new TemplateValue(["x"], ["<", ">"])
    const sink = new StringSink()

    streamValue(sink, () => inner)

    expect(sink.toString()).toBe("<x>")
  })
})
