export { CliProvider, type CliProviderDeps } from "./adapters/cli/cli-provider"
export { formatHelp } from "./adapters/cli/help"
export { type ParsedArgs, parseArgs } from "./adapters/cli/parse-args"
export { CompositeProvider } from "./adapters/composite/composite-provider"
export { DotenvProvider, type DotenvProviderOptions } from "./adapters/dotenv/dotenv-provider"
export { EnvProvider, type EnvProviderOptions } from "./adapters/env/env-provider"
export {
  JsonFileProvider,
  type JsonFileProviderOptions,
} from "./adapters/json/json-file-provider"
export { ObjectProvider } from "./adapters/object/object-provider"
export { type BuildInfo, currentBuildInfo, formatVersion } from "./core/build-info"
export { type ConfigureOptions, type ConfigureResult, configure } from "./core/configure"
export { formatDuration, type Milliseconds, parseDuration } from "./core/duration"
export {
  ConfigError,
  type ConfigErrorCode,
  FatalConfigError,
  type FatalConfigErrorCode,
  isFatalConfigError,
} from "./core/errors"
export { type ExitOnFatalDeps, exitOnFatal } from "./core/exit-on-fatal"
export {
  type InitCallback,
  InitScheduler,
  type InitSchedulerDeps,
  type SchedulerState,
} from "./core/init-scheduler"
export { envNameFor, prefixed } from "./core/names"
export {
  type ParamOrigin,
  ParamRegistry,
  type ParamRegistryDeps,
  type ResolutionReport,
  type ResolvedParam,
} from "./core/param-registry"
export { createTypeRegistry, TypeRegistry } from "./core/type-registry"
export {
  boolType,
  builtinTypes,
  durationType,
  int64Type,
  intType,
  jsonType,
  stringType,
  structuredAsIs,
  structuredString,
} from "./core/types/builtin-types"
export {
  type BuiltinParamTypeTag,
  type ParamDeclaration,
  type ParamSlot,
  ParamTypes,
  sameDeclaration,
} from "./ports/param"
export type { ParamType } from "./ports/param-type"
export type { ParamProvider, ProviderResult } from "./ports/provider"
