export {
  JsonFileSource,
  type JsonFileSourceOptions,
} from "./adapters/json/json-file-source"
export { ObjectSource } from "./adapters/object/object-source"
export { StringSource } from "./adapters/string/string-source"
export { defaultTemplate } from "./core/defaults"
export { loadTemplate, parseTemplate, resolveTemplate } from "./core/load"
export { mergeDeep } from "./core/merge"
export {
  type FormatterTemplate,
  type LoggerTemplate,
  loggerTemplateSchema,
  type OutputTemplate,
} from "./core/schema"
export {
  buildLogger,
  fromTemplate,
  fromTemplateString,
  saveTemplate,
  toTemplate,
  toTemplateString,
} from "./core/template"
export type { TemplateSource } from "./ports/source"
