import type { Renderable } from "./markers"
import type { TextSink } from "./text-sink"

export const TEMPLATE_VALUE: unique symbol = Symbol.for("weft.template-value")

/**
 * What the renderer and the cacheability check need to know about a nested
 * template, without depending on the concrete class.
 */
export interface TemplateLike extends Renderable {
  readonly [TEMPLATE_VALUE]: true
  readonly isCacheable: boolean
  writeTo<S extends TextSink>(sink: S): S
}

/** Brand check; enough to pick the streaming path when rendering. */
export function isTemplateLike(value: unknown): value is TemplateLike {
  return (
    typeof value === "object" &&
    value !== null &&
    TEMPLATE_VALUE in value &&
    value[TEMPLATE_VALUE] === true
  )
}

const issued = new WeakSet<TemplateLike>()

/** @internal Called once per TemplateValue on construction. */
export function recordIssuedTemplate(template: TemplateLike): void {
  issued.add(template)
}

/**
 * True only for templates constructed by this package. The brand alone can be
 * copied onto any object, so cacheability is never taken from it.
 */
export function isIssuedTemplate(value: unknown): value is TemplateLike {
  return isTemplateLike(value) && issued.has(value)
}
