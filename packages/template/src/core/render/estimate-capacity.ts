import type { CapacityPolicy } from "../../ports/template-context"

export const DEFAULT_CAPACITY_POLICY: CapacityPolicy = Object.freeze({
  perValue: 8,
  minimum: 16,
})

export function estimateCapacity(
  strings: readonly string[],
  valueCount: number,
  policy: CapacityPolicy = DEFAULT_CAPACITY_POLICY,
): number {
  let total = valueCount * policy.perValue
  for (const literal of strings) total += literal.length

  return Math.max(total, policy.minimum)
}
