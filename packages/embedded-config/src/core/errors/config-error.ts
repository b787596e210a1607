import type { ErrorCode, ErrorContext, SerializedError, Stage } from "../../ports/error"

export type ConfigErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  stage: Stage
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

/**
 * Base class of every failure raised while resolving a config value.
 *
 * None of them are retryable: the same inputs produce the same failure, so a
 * resolution either fully succeeds or fully fails.
 */
export class ConfigError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C
  readonly stage: Stage
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: ConfigErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.stage = options.stage
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * ConfigError instances keep their code, stage and context; other errors get
 * the code "unknown" and are marked non-operational.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof ConfigError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      stage: err.stage,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
