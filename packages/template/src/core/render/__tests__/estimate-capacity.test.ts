import { DEFAULT_CAPACITY_POLICY, estimateCapacity } from "../estimate-capacity"

describe("estimateCapacity", () => {
  it("sums literal lengths and a per-value allowance", () => {
    expect(estimateCapacity(["abcdefghij", "abcdefghij"], 2)).toBe(36)
  })

  it("returns the minimum for small templates", () => {
    expect(estimateCapacity(["Hi ", "!"], 0)).toBe(16)
    expect(estimateCapacity([], 0)).toBe(DEFAULT_CAPACITY_POLICY.minimum)
  })

  it("follows a custom policy", () => {
    expect(estimateCapacity(["ab"], 3, { perValue: 0, minimum: 0 })).toBe(2)
    expect(estimateCapacity(["ab"], 3, { perValue: 100, minimum: 0 })).toBe(302)
  })
})
