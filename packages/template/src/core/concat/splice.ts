export type TemplateParts<V = unknown> = Readonly<{
  values: readonly V[]
  strings: readonly string[]
}>

export type SplicedParts = {
  values: unknown[]
  strings: string[]
}

/**
 * Joins two literal/value interleavings into one, in fresh arrays.
 *
 * When `left` ends on a literal and `right` starts with one, the two literals are
 * fused so the result keeps at most one literal between consecutive values.
 */
export function splice(left: TemplateParts, right: TemplateParts): SplicedParts {
  const values = [...left.values, ...right.values]

  const leftEndsOnLiteral = left.strings.length > left.values.length
  const [rightFirst, ...rightRest] = right.strings

  if (!leftEndsOnLiteral || rightFirst === undefined) {
    return { values, strings: [...left.strings, ...right.strings] }
  }

  const leftLast = left.strings.at(-1) ?? ""

  return {
    values,
    strings: [...left.strings.slice(0, -1), leftLast + rightFirst, ...rightRest],
  }
}
