import type { Logger } from "@weft/logger"

/**
 * Inputs to the output-buffer size hint. Never affects rendered text.
 */
export type CapacityPolicy = Readonly<{
  /** Characters assumed for each embedded value, whose real length is unknown. */
  perValue: number
  /** Lower bound of the hint. */
  minimum: number
}>

/**
 * Shared by every template created through one factory and inherited by templates
 * derived from them (freeze, concatenation).
 */
export type TemplateContext = Readonly<{
  logger: Logger
  capacity: CapacityPolicy
}>
