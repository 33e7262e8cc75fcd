import { createNullLogger } from "@weft/logger"
import { StringSink } from "../adapters/sinks/string-sink"
import type { StorageAccess } from "../ports/storage-access"
import type { TemplateBuilder } from "../ports/template-builder"
import type { TemplateContext } from "../ports/template-context"
import { recordIssuedTemplate, TEMPLATE_VALUE, type TemplateLike } from "../ports/template-like"
import type { TextSink } from "../ports/text-sink"
import { isCacheable } from "./cacheability/is-cacheable"
import { splice } from "./concat/splice"
import { DEFAULT_CAPACITY_POLICY, estimateCapacity } from "./render/estimate-capacity"
import { renderValue, streamValue } from "./render/write-value"
import { writeParts } from "./render/write-parts"
import { TemplateText } from "./text/template-text"

export const DEFAULT_TEMPLATE_CONTEXT: TemplateContext = Object.freeze({
  logger: createNullLogger(),
  capacity: DEFAULT_CAPACITY_POLICY,
})

type Storage =
  | { readonly kind: "shared"; readonly values: unknown[]; readonly strings: string[] }
  | {
      readonly kind: "owned"
      readonly values: readonly unknown[]
      readonly strings: readonly string[]
    }

/**
 * State handed over when an instance is derived from another one instead of being
 * built from caller-supplied arrays. With `frozen`, the arrays passed alongside must
 * not be referenced anywhere else.
 *
 * @internal
 */
export type Derivation = Readonly<{
  frozen: boolean
  cacheable: boolean
  cachedRendering?: string | undefined
}>

/**
 * Literal text fragments interleaved with embedded values, rendered lazily.
 *
 * Literal `i` precedes value `i`; one extra trailing literal is allowed, so
 * `strings.length` must equal `values.length` or `values.length + 1`. The lengths are
 * not checked: other shapes render unpredictably.
 *
 * A template built from arrays shares them with the caller. Its rendering is cached
 * when every value is known to render identically each time (see
 * {@link isCacheable}), until the arrays are handed out again through
 * {@link TemplateValue.access}. {@link TemplateValue.freeze} produces a copy that
 * owns its arrays and keeps its cache for good.
 *
 * @example
 * ```ts
 * const greeting = new TemplateValue(["Ada"], ["Hello, ", "!"])
 * greeting.toString() // "Hello, Ada!"
 * ```
 */
export class TemplateValue implements TemplateLike {
  readonly [TEMPLATE_VALUE] = true as const

  private readonly storage: Storage
  private cacheable: boolean
  private cachedRendering: string | undefined

  constructor(
    values: unknown[],
    strings: string[],
    readonly context: TemplateContext = DEFAULT_TEMPLATE_CONTEXT,
    derivation?: Derivation,
  ) {
    // A frozen derivation receives arrays nobody else references.
    this.storage = derivation?.frozen
      ? { kind: "owned", values: Object.freeze(values), strings: Object.freeze(strings) }
      : { kind: "shared", values, strings }

    this.cacheable = derivation ? derivation.cacheable : isCacheable(values)
    this.cachedRendering = derivation?.cachedRendering

    recordIssuedTemplate(this)
  }

  get isFrozen(): boolean {
    return this.storage.kind === "owned"
  }

  get isCacheable(): boolean {
    return this.cacheable
  }

  get hasCachedRendering(): boolean {
    return this.cachedRendering !== undefined
  }

  get valueCount(): number {
    return this.storage.values.length
  }

  get literalCount(): number {
    return this.storage.strings.length
  }

  /** Reads one value without exposing the backing array. */
  valueAt(index: number): unknown {
    return this.storage.values[index]
  }

  /**
   * An equivalent template that owns private copies of both arrays. Cacheability and
   * any cached rendering carry over.
   */
  freeze(): TemplateValue {
    this.context.logger.trace("template frozen", this.logMeta("freeze"))

    return new TemplateValue(
      [...this.storage.values],
      [...this.storage.strings],
      this.context,
      { frozen: true, cacheable: this.cacheable, cachedRendering: this.cachedRendering },
    )
  }

  /**
   * Hands out the backing arrays.
   *
   * Non-frozen: the live arrays, and the render cache is disabled for good since the
   * caller can now change what this template renders. Frozen: fresh copies, cache
   * untouched.
   */
  access(): StorageAccess {
    const storage = this.storage

    if (storage.kind === "owned") {
      return { kind: "snapshot", values: [...storage.values], strings: [...storage.strings] }
    }

    this.invalidate()

    return { kind: "borrowed", values: storage.values, strings: storage.strings }
  }

  getValues(): unknown[] {
    return this.access().values
  }

  getStrings(): string[] {
    return this.access().strings
  }

  /**
   * Joins `other` after this template. A string counts as a single literal.
   *
   * `other` is frozen first unless it already is; this template is read as it is.
   * The result is cacheable only if both sides are, and starts without a cached
   * rendering.
   */
  plus(other: TemplateValue | string): TemplateValue {
    const right =
      typeof other === "string"
        ? new TemplateValue([], [other], this.context)
        : other.isFrozen
          ? other
          : other.freeze()

    const joined = splice(this.storage, right.storage)

    return new TemplateValue(joined.values, joined.strings, this.context, {
      frozen: false,
      cacheable: this.cacheable && right.cacheable,
    })
  }

  toString(): string {
    if (this.cachedRendering !== undefined) return this.cachedRendering

    const sink = new StringSink(this.estimateCapacity())
    writeParts(sink, this.storage.values, this.storage.strings, renderValue)
    const text = sink.toString()

    if (this.cacheable) {
      this.cachedRendering = text
      this.context.logger.trace("template rendering cached", this.logMeta("render"))
    }

    return text
  }

  toJSON(): string {
    return this.toString()
  }

  /** String coercion (`${t}`, `t + ""`) yields the rendering, whatever the hint. */
  [Symbol.toPrimitive](_hint: string): string {
    return this.toString()
  }

  /**
   * Streams the rendering into `sink` fragment by fragment, without building the
   * whole text and without touching the render cache.
   */
  writeTo<S extends TextSink>(sink: S): S {
    writeParts(sink, this.storage.values, this.storage.strings, streamValue)
    return sink
  }

  /**
   * Feeds literals and raw values to `builder` in positional order. Nothing is
   * rendered; nested templates and lazy values are passed through as they are.
   */
  build(builder: TemplateBuilder): void {
    const { values, strings } = this.storage

    for (let i = 0; i < strings.length; i++) {
      builder.literal(strings[i] ?? "")
      if (i < values.length) {
        builder.value(values[i])
      }
    }
  }

  /** Size hint for an output buffer; the real rendered length may differ. */
  estimateCapacity(): number {
    return estimateCapacity(this.storage.strings, this.storage.values.length, this.context.capacity)
  }

  /** Read-only string operations over the rendered text. */
  text(): TemplateText {
    return new TemplateText(this)
  }

  equals(other: unknown): boolean {
    return other instanceof TemplateValue && other.toString() === this.toString()
  }

  private invalidate(): void {
    if (!this.cacheable) return

    this.cacheable = false
    this.cachedRendering = undefined
    this.context.logger.debug(
      "template storage exposed, render cache disabled",
      this.logMeta("access"),
    )
  }

  private logMeta(operation: string) {
    return {
      operation,
      valueCount: this.valueCount,
      literalCount: this.literalCount,
      frozen: this.isFrozen,
      cacheable: this.cacheable,
    }
  }
}
