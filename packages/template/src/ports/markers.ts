/**
 * Capability markers consulted when deciding whether a template's rendering may be
 * cached. Keys come from the global symbol registry so that separately bundled
 * copies of this package agree on them.
 */
export const IMMUTABLE: unique symbol = Symbol.for("weft.immutable")
export const PURE_RENDER: unique symbol = Symbol.for("weft.pure-render")

/**
 * A value whose state never changes after construction, so its text never changes
 * either.
 *
 * @example
 * ```ts
 * class Money implements Immutable {
 *   readonly [IMMUTABLE] = true as const
 *   constructor(readonly cents: number) {}
 *   toString() { return (this.cents / 100).toFixed(2) }
 * }
 * ```
 */
export interface Immutable {
  readonly [IMMUTABLE]: true
}

/**
 * A render function declared deterministic and free of side effects: a lazy value,
 * or the `toString` (or `Symbol.toPrimitive`) method a value's text comes from.
 * Set through `pure()`, never on the value object itself.
 *
 * @example
 * ```ts
 * class Slug {
 *   constructor(private readonly title: string) {}
 *   toString() { return this.title.toLowerCase().replaceAll(" ", "-") }
 * }
 * pure(Slug.prototype.toString)
 * ```
 */
export interface PureRenderable {
  readonly [PURE_RENDER]: true
}

/** Anything that can be asked for its text. */
export interface Renderable {
  toString(): string
}
