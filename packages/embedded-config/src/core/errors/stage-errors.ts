import { ConfigError } from "./config-error"

export type LocationErrorCode = "missing_location_config" | "invalid_location_value"

export type LoadErrorCode =
  | "source_not_found"
  | "source_read_error"
  | "invalid_encoding"
  | "parse_error"

export type ResolutionErrorCode = "missing_field"

export type CoercionErrorCode = "unsupported_value_type"

export type StageErrorCode =
  | LocationErrorCode
  | LoadErrorCode
  | ResolutionErrorCode
  | CoercionErrorCode

/** The document's location could not be determined. */
export class LocationError extends ConfigError<LocationErrorCode> {}

/** The document could not be read, decoded or parsed. */
export class LoadError extends ConfigError<LoadErrorCode> {}

/** The requested field does not exist in the document. */
export class ResolutionError extends ConfigError<ResolutionErrorCode> {}

/** The field exists but its value is not a supported scalar. */
export class CoercionError extends ConfigError<CoercionErrorCode> {}

export type StageError = LocationError | LoadError | ResolutionError | CoercionError

export function isStageError(err: unknown): err is StageError {
  return (
    err instanceof LocationError ||
    err instanceof LoadError ||
    err instanceof ResolutionError ||
    err instanceof CoercionError
  )
}

export function missingLocationConfig(variables: {
  override: string
  root: string
  manifestFile: string
  manifestField: string
}): LocationError {
  return new LocationError(
    `Neither ${variables.override} nor ${variables.manifestField} (in ${variables.manifestFile}) is set`,
    { code: "missing_location_config", stage: "locate", context: variables },
  )
}

export function invalidLocationValue(field: string, actual: string): LocationError {
  return new LocationError(`${field} is not of type string (found ${actual})`, {
    code: "invalid_location_value",
    stage: "locate",
    context: { field, actual },
  })
}

export function sourceNotFound(path: string, cause?: unknown): LoadError {
  return new LoadError(`config does not exist: ${path}`, {
    code: "source_not_found",
    stage: "load",
    context: { path },
    cause,
  })
}

export function sourceReadError(path: string, cause: unknown): LoadError {
  const reason = cause instanceof Error ? cause.message : String(cause)

  return new LoadError(`loading the config from ${path} failed: ${reason}`, {
    code: "source_read_error",
    stage: "load",
    context: { path },
    cause,
  })
}

export function invalidEncoding(path: string, byteOffset: number): LoadError {
  return new LoadError(
    `loading ${path} lead to a decode error: invalid utf-8 character at byte ${byteOffset}`,
    { code: "invalid_encoding", stage: "load", context: { path, byteOffset } },
  )
}

export function parseError(
  path: string,
  diagnostic: string,
  options: { line?: number; column?: number; cause?: unknown } = {},
): LoadError {
  const { cause, ...position } = options

  return new LoadError(`loading ${path} lead to a decode error: not valid toml: ${diagnostic}`, {
    code: "parse_error",
    stage: "load",
    context: { path, ...position },
    cause,
  })
}

export function missingField(field: string): ResolutionError {
  return new ResolutionError(`config does not contain a field matching ${field}`, {
    code: "missing_field",
    stage: "resolve",
    context: { field },
  })
}

export function unsupportedValueType(actual: string, expected?: string): CoercionError {
  const suffix = expected === undefined ? "" : `, expected ${expected}`

  return new CoercionError(`resulted in unsupported return type ${actual}${suffix}`, {
    code: "unsupported_value_type",
    stage: "coerce",
    context: expected === undefined ? { actual } : { actual, expected },
  })
}
