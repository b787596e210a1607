export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (paths, offsets, fields) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/** Pipeline stage that raised an error. */
export type Stage = "locate" | "load" | "resolve" | "coerce"

/**
 * Where a failure should be reported at the request site.
 *
 * `invocation` covers failures to find or read the document, `field` covers
 * failures tied to the requested field itself.
 */
export type Site = "invocation" | "field"

/**
 * Serialized error shape for logging and tooling output.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  stage?: Stage
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
