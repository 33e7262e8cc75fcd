import type { TemplateBuilder, TemplatePart } from "../../ports/template-builder"

/**
 * Records the build sequence as a list of parts, e.g. to turn a template into a
 * parameterised query (literals become query text, values become parameters).
 */
export class PartsBuilder implements TemplateBuilder {
  private readonly recorded: TemplatePart[] = []

  literal(text: string): void {
    this.recorded.push({ kind: "literal", text })
  }

  value(value: unknown): void {
    this.recorded.push({ kind: "value", value })
  }

  get parts(): readonly TemplatePart[] {
    return this.recorded
  }
}
