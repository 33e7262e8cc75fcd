import { createLogger, type Logger } from "@weft/logger"
import type { Renderable } from "../../ports/markers"
import type { TemplateContext } from "../../ports/template-context"
import { DEFAULT_TEMPLATE_CONFIG, type TemplateConfig } from "../config/template-config"
import { TemplateValue } from "../template-value"
import { TemplateText } from "../text/template-text"

/**
 * Tag for JavaScript template literals: ``template`Hello, ${name}!` `` keeps `name`
 * embedded rather than converting it to text right away.
 */
export function template(strings: TemplateStringsArray, ...values: unknown[]): TemplateValue {
  return new TemplateValue(values, [...strings])
}

export type TemplateFactoryOptions = {
  config?: TemplateConfig
  /** Defaults to a pino logger built from `config.logging`. */
  logger?: Logger
}

export type TemplateFactory = {
  readonly context: TemplateContext
  tag(strings: TemplateStringsArray, ...values: unknown[]): TemplateValue
  of(values: unknown[], strings: string[]): TemplateValue
  text(source: Renderable): TemplateText
}

/**
 * Templates created through the factory, and those derived from them, share its
 * logger and capacity policy.
 */
export function createTemplateFactory(options: TemplateFactoryOptions = {}): TemplateFactory {
  const config = options.config ?? DEFAULT_TEMPLATE_CONFIG
  const logger = options.logger ?? createLogger(config.logging)

  const context: TemplateContext = Object.freeze({
    logger: logger.child({ module: "template" }),
    capacity: config.capacity,
  })

  return {
    context,
    tag: (strings, ...values) => new TemplateValue(values, [...strings], context),
    of: (values, strings) => new TemplateValue(values, strings, context),
    text: (source) => new TemplateText(source),
  }
}
