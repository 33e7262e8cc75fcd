import { BaseError } from "@weft/errors"

export type TemplateErrorCode = "invalid_argument"

export class TemplateError extends BaseError<TemplateErrorCode> {}
