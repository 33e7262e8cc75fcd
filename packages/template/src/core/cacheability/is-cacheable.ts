import type { LazyValue } from "../../ports/lazy-value"
import { IMMUTABLE, PURE_RENDER, type PureRenderable } from "../../ports/markers"
import { isIssuedTemplate } from "../../ports/template-like"

const immutableTypes = new WeakSet<object>()

/**
 * Declares instances of `type` immutable, for classes that cannot carry the
 * {@link IMMUTABLE} marker themselves. Only exact instances count, not subclasses.
 */
export function registerImmutable(type: abstract new (...args: never[]) => unknown): void {
  immutableTypes.add(type)
}

/**
 * Marks a render function as deterministic and side-effect free. Sets the marker on
 * `fn` itself and returns it.
 *
 * Works for lazy values (`pure(() => id)`) and for methods:
 * `pure(Money.prototype.toString)` makes every instance whose `toString` resolves to
 * that method cacheable. A subclass overriding `toString` has to mark its override.
 */
export function pure<F extends LazyValue>(fn: F): F & PureRenderable {
  return Object.assign(fn, { [PURE_RENDER]: true as const })
}

function hasMarker(value: object, marker: symbol): boolean {
  return marker in value && Reflect.get(value, marker) === true
}

// What String(value) ends up calling: @@toPrimitive when present, toString otherwise.
function renderFunction(value: object): unknown {
  const toPrimitive: unknown = Reflect.get(value, Symbol.toPrimitive)
  if (typeof toPrimitive === "function") return toPrimitive

  return Reflect.get(value, "toString")
}

function rendersPurely(value: object): boolean {
  if (typeof value === "function") return hasMarker(value, PURE_RENDER)

  const render = renderFunction(value)

  return typeof render === "function" && hasMarker(render, PURE_RENDER)
}

/**
 * Whether `value` is guaranteed to render to the same text every time.
 *
 * Safe: null, every primitive, values marked or registered immutable, values whose
 * render function is marked pure, and templates created by this package that are
 * themselves cacheable. Everything else is not.
 */
export function isSafeValue(value: unknown): boolean {
  if (value === null) return true
  if (typeof value !== "object" && typeof value !== "function") return true

  if (hasMarker(value, IMMUTABLE) || immutableTypes.has(value.constructor)) return true
  if (rendersPurely(value)) return true

  return isIssuedTemplate(value) && value.isCacheable
}

/**
 * Whether a rendering of `values` may be cached: one unsafe value makes the whole
 * sequence unsafe.
 */
export function isCacheable(values: readonly unknown[]): boolean {
  return values.every(isSafeValue)
}
