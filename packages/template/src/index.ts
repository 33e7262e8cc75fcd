export { PartsBuilder } from "./adapters/builders/parts-builder"
export { CallbackSink } from "./adapters/sinks/callback-sink"
export { StringSink } from "./adapters/sinks/string-sink"
export { isCacheable, isSafeValue, pure, registerImmutable } from "./core/cacheability/is-cacheable"
export { type SplicedParts, splice, type TemplateParts } from "./core/concat/splice"
export {
  DEFAULT_TEMPLATE_CONFIG,
  type LoadTemplateConfigOptions,
  loadTemplateConfig,
  mapEnvToTemplateConfig,
  type TemplateConfig,
  type TemplateEnv,
  templateEnvSchema,
} from "./core/config/template-config"
export {
  createTemplateFactory,
  type TemplateFactory,
  type TemplateFactoryOptions,
  template,
} from "./core/factory/create-template-factory"
export { DEFAULT_CAPACITY_POLICY, estimateCapacity } from "./core/render/estimate-capacity"
export { TemplateError, type TemplateErrorCode } from "./core/template-error"
export { DEFAULT_TEMPLATE_CONTEXT, TemplateValue } from "./core/template-value"
export { TemplateText } from "./core/text/template-text"
export type { LazyValue, WriterValue } from "./ports/lazy-value"
export { IMMUTABLE, type Immutable, PURE_RENDER, type PureRenderable, type Renderable } from "./ports/markers"
export type { BorrowedView, OwnedSnapshot, StorageAccess } from "./ports/storage-access"
export type { LiteralPart, TemplateBuilder, TemplatePart, ValuePart } from "./ports/template-builder"
export type { CapacityPolicy, TemplateContext } from "./ports/template-context"
export { isIssuedTemplate, isTemplateLike, TEMPLATE_VALUE, type TemplateLike } from "./ports/template-like"
export type { TextSink } from "./ports/text-sink"
