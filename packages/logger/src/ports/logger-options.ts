import { z } from "zod"
import { logLevelNames } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior:
 * - which log levels are emitted
 * - how logs are rendered for humans vs machines
 */
export const loggerOptionsSchema = z.object({
  /**
   * Minimum log level to emit.
   * Any log entries below this level are ignored.
   */
  level: z.enum(logLevelNames).default("info"),

  /**
   * Whether to pretty-print log output for human readability.
   * Intended for local runs; leave it off where logs are collected as JSON.
   */
  prettify: z
    .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
    .optional()
    .transform((v) => v === true || v === "true" || v === "1"),
})

export type LoggerOptions = z.output<typeof loggerOptionsSchema>

export type LoggerOptionsInput = z.input<typeof loggerOptionsSchema>

export function parseLoggerOptions(input: LoggerOptionsInput | Record<string, unknown>): LoggerOptions {
  const result = loggerOptionsSchema.safeParse(input)

  if (!result.success) {
    throw new Error(`Logger options validation failed:\n${z.prettifyError(result.error)}`)
  }

  return result.data
}
