import {
  DEFAULT_MAX_BUFFER_SIZE,
  DEFAULT_ON_DROP_POLICY,
  DEFAULT_VERBOSITY,
  defaultFormatterConfig,
} from "@inkwell/logger"
import type { LoggerTemplate } from "./schema"

/** The template of a logger built with no options. */
export function defaultTemplate(): LoggerTemplate {
  return {
    formatter: defaultFormatterConfig(),
    output: {
      enabled: true,
      stderr: { enabled: true },
      buffer: { enabled: false },
      file: {
        enabled: false,
        path: null,
        maxBufferSize: DEFAULT_MAX_BUFFER_SIZE,
        onDropPolicy: DEFAULT_ON_DROP_POLICY,
      },
    },
    verbosity: DEFAULT_VERBOSITY,
    filteringEnabled: true,
  }
}
