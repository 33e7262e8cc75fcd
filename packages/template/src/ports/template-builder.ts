/**
 * Consumer of a template's structure rather than its text: receives every literal
 * and every raw, unrendered value in positional order.
 */
export interface TemplateBuilder {
  literal(text: string): void
  value(value: unknown): void
}

export type LiteralPart = Readonly<{ kind: "literal"; text: string }>
export type ValuePart = Readonly<{ kind: "value"; value: unknown }>

export type TemplatePart = LiteralPart | ValuePart
