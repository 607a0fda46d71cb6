import fs from "node:fs/promises"
import { ConfigError, hasErrorCode, toIoError } from "@inkwell/errors"
import { Logger, type LoggerDeps } from "@inkwell/logger"
import { JsonFileSource } from "../adapters/json/json-file-source"
import { ObjectSource } from "../adapters/object/object-source"
import { StringSource } from "../adapters/string/string-source"
import { loadTemplate, resolveTemplate } from "./load"
import type { TemplateSource } from "../ports/source"
import type { LoggerTemplate } from "./schema"

/** Captures the configuration of a logger as a template. */
export function toTemplate(logger: Logger): LoggerTemplate {
  const { file } = logger

  return {
    formatter: logger.formatter.config(),
    output: {
      enabled: logger.output.isEnabled(),
      stderr: { enabled: logger.stderr.isEnabled() },
      buffer: { enabled: logger.buffer.isEnabled() },
      file: {
        enabled: file.isEnabled(),
        path: file.getPath() ?? null,
        maxBufferSize: file.getMaxBufferSize(),
        onDropPolicy: file.getOnDropPolicy(),
      },
    },
    verbosity: logger.getVerbosity(),
    filteringEnabled: logger.isFilteringEnabled(),
  }
}

/**
 * Builds a logger from a validated template.
 *
 * @throws ConfigError when the template cannot be applied, e.g. a log format
 * without `%m` or an unwritable file path; the underlying error is the cause
 */
export function buildLogger(template: LoggerTemplate, deps: LoggerDeps = {}): Logger {
  const { formatter, output } = template

  try {
    return new Logger(deps, {
      formatter,
      verbosity: template.verbosity,
      filteringEnabled: template.filteringEnabled,
      outputEnabled: output.enabled,
      stderr: output.stderr,
      buffer: output.buffer,
      file: {
        enabled: output.file.enabled,
        path: output.file.path ?? undefined,
        maxBufferSize: output.file.maxBufferSize,
        onDropPolicy: output.file.onDropPolicy,
      },
    })
  } catch (err) {
    if (hasErrorCode(err, "config")) throw err

    throw new ConfigError("Logger template cannot be applied", { cause: err })
  }
}

/**
 * Reads a JSON template file, fills missing fields with defaults and builds
 * the logger it describes. `overrides` is applied over the file.
 *
 * @throws ConfigError
 */
export async function fromTemplate(
  path: string,
  deps: LoggerDeps = {},
  overrides?: Record<string, unknown>,
): Promise<Logger> {
  const sources: TemplateSource[] = [new JsonFileSource({ file: path, required: true })]

  if (overrides) sources.push(new ObjectSource(overrides))

  return buildLogger(await loadTemplate(sources), deps)
}

/** @throws ConfigError */
export function fromTemplateString(text: string, deps: LoggerDeps = {}): Logger {
  return buildLogger(resolveTemplate([new StringSource(text).read()]), deps)
}

export function toTemplateString(logger: Logger): string {
  return JSON.stringify(toTemplate(logger), null, 2)
}

/**
 * Writes the logger's template to `path`, replacing the file.
 *
 * @throws IoError when the file cannot be written
 */
export async function saveTemplate(logger: Logger, path: string): Promise<void> {
  try {
    await fs.writeFile(path, `${toTemplateString(logger)}\n`, "utf-8")
  } catch (err) {
    throw toIoError(err, `Failed to write template: ${path}`, { path })
  }
}
