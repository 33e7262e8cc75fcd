import { type ConfigSource, EnvSource, loadConfig, ObjectSource } from "@weft/config"
import { type LoggerOptions, logLevelNames } from "@weft/logger"
import { z } from "zod"
import type { CapacityPolicy } from "../../ports/template-context"
import { DEFAULT_CAPACITY_POLICY } from "../render/estimate-capacity"

export const templateEnvSchema = z.object({
  WEFT_CAPACITY_PER_VALUE: z.coerce.number().int().min(0).default(DEFAULT_CAPACITY_POLICY.perValue),
  WEFT_CAPACITY_MINIMUM: z.coerce.number().int().min(0).default(DEFAULT_CAPACITY_POLICY.minimum),
  WEFT_LOG_LEVEL: z.enum(logLevelNames).default("warn"),
  WEFT_LOG_PRETTY: z.stringbool().default(false),
})

export type TemplateEnv = z.infer<typeof templateEnvSchema>

export type TemplateConfig = Readonly<{
  capacity: CapacityPolicy
  logging: LoggerOptions
}>

export const DEFAULT_TEMPLATE_CONFIG: TemplateConfig = Object.freeze({
  capacity: DEFAULT_CAPACITY_POLICY,
  logging: { level: "warn", prettify: false },
})

export function mapEnvToTemplateConfig(env: TemplateEnv): TemplateConfig {
  return {
    capacity: {
      perValue: env.WEFT_CAPACITY_PER_VALUE,
      minimum: env.WEFT_CAPACITY_MINIMUM,
    },
    logging: {
      level: env.WEFT_LOG_LEVEL,
      prettify: env.WEFT_LOG_PRETTY,
    },
  }
}

export type LoadTemplateConfigOptions = {
  /** Defaults to process.env. */
  env?: Record<string, string | undefined>
  /** Raw values applied after the environment, e.g. `{ WEFT_LOG_LEVEL: "debug" }`. */
  overrides?: Record<string, string | undefined>
}

export async function loadTemplateConfig(
  options: LoadTemplateConfigOptions = {},
): Promise<TemplateConfig> {
  const sources: ConfigSource[] = [new EnvSource({ env: options.env ?? process.env })]
  if (options.overrides) sources.push(new ObjectSource(options.overrides))

  const result = await loadConfig({ schema: templateEnvSchema, sources })

  return mapEnvToTemplateConfig(result.value)
}
