import { splice } from "../splice"

describe("splice", () => {
  it("fuses the last literal of the left side with the first of the right", () => {
    const result = splice({ values: [1], strings: ["a", "b"] }, { values: [2], strings: ["c", "d"] })

    expect(result).toEqual({ values: [1, 2], strings: ["a", "bc", "d"] })
  })

  it("appends when the left side ends on a value", () => {
    const result = splice({ values: ["V"], strings: ["x"] }, { values: [], strings: ["y"] })

    expect(result).toEqual({ values: ["V"], strings: ["x", "y"] })
  })

  it("appends when the right side has no literals", () => {
    const result = splice({ values: [1], strings: ["a", "b"] }, { values: [], strings: [] })

    expect(result).toEqual({ values: [1], strings: ["a", "b"] })
  })

  it("fuses into an empty left side", () => {
    const result = splice({ values: [], strings: [""] }, { values: [2], strings: ["c", "d"] })

    expect(result).toEqual({ values: [2], strings: ["c", "d"] })
  })

  it("leaves its inputs untouched", () => {
    const left = { values: [1], strings: ["a", "b"] }
    const right = { values: [2], strings: ["c", "d"] }

    const result = splice(left, right)

    expect(left).toEqual({ values: [1], strings: ["a", "b"] })
    expect(right).toEqual({ values: [2], strings: ["c", "d"] })
    expect(result.values).not.toBe(left.values)
    expect(result.strings).not.toBe(left.strings)
  })
})
