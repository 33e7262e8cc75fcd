import type { Renderable } from "../../ports/markers"
import { TemplateError } from "../template-error"

const LINE_TERMINATOR = /\r\n|\r|\n/

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff
}

function compareUnits(a: string, b: string): number {
  const limit = Math.min(a.length, b.length)

  for (let i = 0; i < limit; i++) {
    const diff = a.charCodeAt(i) - b.charCodeAt(i)
    if (diff !== 0) return diff
  }

  return a.length - b.length
}

function foldCase(text: string): string {
  return text.toUpperCase().toLowerCase()
}

function anchored(pattern: RegExp | string): RegExp {
  if (typeof pattern === "string") return new RegExp(`^(?:${pattern})$`)

  return new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace(/[gy]/g, ""))
}

/**
 * String operations over the current rendering of a template (or anything else
 * with a `toString()`). Every call renders first, then defers to JavaScript's
 * `String`, so results follow its semantics (UTF-16 indices, regex flavour).
 */
export class TemplateText implements Renderable {
  constructor(private readonly source: Renderable) {}

  toString(): string {
    return this.source.toString()
  }

  get length(): number {
    return this.toString().length
  }

  isEmpty(): boolean {
    return this.toString().length === 0
  }

  isBlank(): boolean {
    return this.toString().trim().length === 0
  }

  trim(): string {
    return this.toString().trim()
  }

  strip(): string {
    return this.toString().trim()
  }

  stripLeading(): string {
    return this.toString().trimStart()
  }

  stripTrailing(): string {
    return this.toString().trimEnd()
  }

  /**
   * Lines split on `\r\n`, `\r` or `\n`. An empty text has no lines, and a final
   * terminator does not start another, empty, line.
   */
  lines(): string[] {
    const text = this.toString()
    if (!text) return []

    const lines = text.split(LINE_TERMINATOR)
    if (lines.at(-1) === "") lines.pop()

    return lines
  }

  /**
   * @throws TemplateError `invalid_argument` when `count` is negative or not an integer
   */
  repeat(count: number): string {
    if (!Number.isInteger(count) || count < 0) {
      throw new TemplateError(`repeat count must be a non-negative integer, got ${count}`, {
        code: "invalid_argument",
        context: { count },
      })
    }

    return this.toString().repeat(count)
  }

  codePointAt(index: number): number | undefined {
    return this.toString().codePointAt(index)
  }

  /** Code point ending just before `index`, combining a surrogate pair. */
  codePointBefore(index: number): number | undefined {
    const text = this.toString()
    if (index < 1 || index > text.length) return undefined

    const last = text.charCodeAt(index - 1)
    if (index >= 2 && isLowSurrogate(last) && isHighSurrogate(text.charCodeAt(index - 2))) {
      return text.codePointAt(index - 2)
    }

    return last
  }

  /** Code points in `[begin, end)`; an unpaired surrogate counts as one. */
  codePointCount(begin = 0, end?: number): number {
    return Array.from(this.toString().slice(begin, end)).length
  }

  indexOf(search: string, position?: number): number {
    return this.toString().indexOf(search, position)
  }

  lastIndexOf(search: string, position?: number): number {
    return this.toString().lastIndexOf(search, position)
  }

  includes(search: string): boolean {
    return this.toString().includes(search)
  }

  startsWith(prefix: string, position?: number): boolean {
    return this.toString().startsWith(prefix, position)
  }

  endsWith(suffix: string): boolean {
    return this.toString().endsWith(suffix)
  }

  substring(start: number, end?: number): string {
    return this.toString().substring(start, end)
  }

  concat(...parts: string[]): string {
    return this.toString().concat(...parts)
  }

  replace(search: string | RegExp, replacement: string): string {
    return this.toString().replace(search, replacement)
  }

  replaceAll(search: string | RegExp, replacement: string): string {
    return this.toString().replaceAll(search, replacement)
  }

  /** True only when `pattern` matches the entire text. */
  matches(pattern: RegExp | string): boolean {
    return anchored(pattern).test(this.toString())
  }

  split(separator: string | RegExp, limit?: number): string[] {
    return this.toString().split(separator, limit)
  }

  toLowerCase(locale?: string): string {
    return locale ? this.toString().toLocaleLowerCase(locale) : this.toString().toLowerCase()
  }

  toUpperCase(locale?: string): string {
    return locale ? this.toString().toLocaleUpperCase(locale) : this.toString().toUpperCase()
  }

  equalsIgnoreCase(other: string): boolean {
    return foldCase(this.toString()) === foldCase(other)
  }

  /**
   * Difference of the first differing UTF-16 code units, or of the lengths when one
   * text is a prefix of the other. Zero when equal.
   */
  compareTo(other: string): number {
    return compareUnits(this.toString(), other)
  }

  compareToIgnoreCase(other: string): number {
    return compareUnits(foldCase(this.toString()), foldCase(other))
  }
}
