/**
 * Where raw configuration values come from.
 *
 * A source only loads; validation, coercion and merging belong to loadConfig().
 * Sources are applied in order, later ones override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "object:overrides". */
  readonly name: string

  /**
   * Flat key/value pairs. An `undefined` value means "not provided" and does not
   * override an earlier source.
   */
  load(): Promise<Record<string, unknown>>
}
