import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with the prefix are loaded, with the prefix removed. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  /** Variables set to an empty string count as unset. */
  async load(): Promise<Record<string, unknown>> {
    const prefix = this.prefix ?? ""
    const loaded: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value === undefined || value === "" || !key.startsWith(prefix)) continue

      loaded[key.slice(prefix.length)] = value
    }

    return loaded
  }
}
