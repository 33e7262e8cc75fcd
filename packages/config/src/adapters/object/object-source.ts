import type { ConfigSource } from "../../ports/source"

/** In-code values, typically test or caller overrides applied after the environment. */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
