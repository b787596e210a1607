export { readEnvironment, type EnvReaderOptions } from "./adapters/env/env-reader"
export { readFileBytes } from "./adapters/fs/read-file"
export { coerceValue, isScalarOf, toScalar } from "./core/coerce"
export {
  type EmbedOptions,
  embedConfigValue,
  embedConfigValueOpt,
  inspectConfigValue,
} from "./core/embed"
export { decodeUtf8, type DecodeResult, validUpTo } from "./core/encoding/utf8"
export {
  ConfigError,
  type ConfigErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/errors/config-error"
export { EmbedConfigError, isMissingField } from "./core/errors/embed-config-error"
export { errorChain } from "./core/errors/error-chain"
export {
  CoercionError,
  type CoercionErrorCode,
  isStageError,
  LoadError,
  type LoadErrorCode,
  LocationError,
  type LocationErrorCode,
  ResolutionError,
  type ResolutionErrorCode,
  type StageError,
  type StageErrorCode,
} from "./core/errors/stage-errors"
export { renderLiteral } from "./core/literal"
export { type LoaderDeps, loadDocument } from "./core/load"
export {
  type LocatorOptions,
  type LocatorSettings,
  locateSource,
  MANIFEST_FIELD,
  MANIFEST_FILE,
  OVERRIDE_VARIABLE,
  ROOT_VARIABLE,
} from "./core/locate"
export { LOG_VARIABLE_PREFIX, loggerFromEnv } from "./core/logging"
export { resolveField, splitFieldPath } from "./core/resolve"
export { describeTag, isTable, type ValueTag } from "./core/value-tag"
export type { ConfigArray, ConfigDocument, ConfigTable, ConfigValue } from "./ports/config-value"
export type { EmbeddedValue } from "./ports/embedded-value"
export type { Environment } from "./ports/environment"
export type { ErrorCode, ErrorContext, SerializedError, Site, Stage } from "./ports/error"
export type { ReadFile } from "./ports/read-file"
export {
  type ConfigScalar,
  type ScalarKind,
  type ScalarOf,
  type ScalarTypes,
  type ScalarValue,
} from "./ports/scalar"
export type { SourceLocation, SourceOrigin } from "./ports/source-location"
