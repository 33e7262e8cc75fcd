/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ WEFT_CAPACITY_PER_VALUE: z.coerce.number().default(8) }),
 *   sources: [new EnvSource({ env: process.env })],
 * })
 *
 * config.get("WEFT_CAPACITY_PER_VALUE") // 8
 * config.explain("WEFT_CAPACITY_PER_VALUE") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source that supplied `key`, or "default" for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that supplied at least one value. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know, e.g. typos. */
  unknownKeys(): string[]
}
