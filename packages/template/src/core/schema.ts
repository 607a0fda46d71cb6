import { colorNames, onDropPolicies, verbosityNames } from "@inkwell/logger"
import { z } from "zod"

function perSeverity<T extends z.ZodType>(value: T) {
  return z.strictObject({
    debug: value,
    info: value,
    warning: value,
    error: value,
    fatal: value,
  })
}

export const formatterTemplateSchema = z.strictObject({
  headerColorEnabled: z.boolean(),
  headers: perSeverity(z.string()),
  colors: perSeverity(z.enum(colorNames)),
  logFormat: z.string(),
  datetimeFormat: z.string(),
})

export const fileTemplateSchema = z
  .strictObject({
    enabled: z.boolean(),
    path: z.string().min(1).nullable(),
    maxBufferSize: z.int().positive().nullable(),
    onDropPolicy: z.enum(onDropPolicies),
  })
  .refine((file) => !file.enabled || file.path !== null, {
    error: "A path is required when file output is enabled",
    path: ["path"],
  })

export const outputTemplateSchema = z.strictObject({
  enabled: z.boolean(),
  stderr: z.strictObject({ enabled: z.boolean() }),
  buffer: z.strictObject({ enabled: z.boolean() }),
  file: fileTemplateSchema,
})

/**
 * A serialized logger configuration.
 *
 * Every field is required once merged over the defaults.
 */
export const loggerTemplateSchema = z.strictObject({
  formatter: formatterTemplateSchema,
  output: outputTemplateSchema,
  verbosity: z.enum(verbosityNames),
  filteringEnabled: z.boolean(),
})

export type LoggerTemplate = z.infer<typeof loggerTemplateSchema>
export type FormatterTemplate = z.infer<typeof formatterTemplateSchema>
export type OutputTemplate = z.infer<typeof outputTemplateSchema>
