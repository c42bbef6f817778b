export type { EmitOptions, EmitResult, FormatAdapter, ParseResult } from "./core/adapter.js"
export { defaultEmitOptions } from "./core/adapter.js"
export { adapters, lookupAdapter } from "./core/adapters.js"
export type { CliArgs, CliError } from "./core/cli.js"
export { parseCliArgs } from "./core/cli.js"
export type { ConversionPlan } from "./core/config.js"
export { resolveConversionPlan } from "./core/config.js"
export type { Transcoded } from "./core/convert.js"
export { convert, transcode } from "./core/convert.js"
export type {
  AppError,
  ConversionError,
  IoError,
  ParseError,
  SourcePosition,
  UnrepresentableError,
  UnsupportedFeature,
  UnsupportedFormat
} from "./core/errors.js"
export { exitCodeFor, renderError } from "./core/errors.js"
export type { Format } from "./core/format.js"
export { formatFromPath, parseFormatName } from "./core/format.js"
export { emitJson, parseJson } from "./core/json.js"
export { emitToml } from "./core/toml-emit.js"
export { parseToml } from "./core/toml-parse.js"
export type { MappingEntry, Value, ValueType } from "./core/value.js"
export { bool, float, integer, mapping, nullValue, sequence, string } from "./core/value.js"
export { emitYaml, parseYaml } from "./core/yaml.js"
export { runCli, runCliReporting } from "./app/program.js"
