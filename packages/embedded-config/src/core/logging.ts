import {
  createNullLogger,
  createPinoLogger,
  type Logger,
  loggerOptionsSchema,
} from "@embedcfg/logger"
import { z } from "zod"
import { readEnvironment } from "../adapters/env/env-reader"
import type { Environment } from "../ports/environment"

export const LOG_VARIABLE_PREFIX = "EMBEDCFG_LOG_"

const bindings = { service: "embedded-config" }

// One logger per distinct variable setting, shared by every resolution.
let shared: { key: string; logger: Logger } | undefined

/**
 * Logger for resolutions that were not handed one.
 *
 * Silent unless `EMBEDCFG_LOG_LEVEL` is set. Output goes to stderr so it never
 * mixes with whatever the calling build writes to stdout; with
 * `EMBEDCFG_LOG_PRETTY` it is pretty-printed.
 *
 * Invalid variables do not fail the resolution: a warning is written once and
 * logging stays off.
 */
export function loggerFromEnv(env?: Environment): Logger {
  const vars = readEnvironment({ env, prefix: LOG_VARIABLE_PREFIX })

  if (!vars.LEVEL) return createNullLogger()

  const key = `${vars.LEVEL}\n${vars.PRETTY ?? ""}`

  if (shared?.key !== key) shared = { key, logger: build(vars.LEVEL, vars.PRETTY) }

  return shared.logger
}

function build(level: string, prettify: string | undefined): Logger {
  const result = loggerOptionsSchema.safeParse({ level, prettify })

  if (!result.success) {
    createPinoLogger({ fd: 2 }, { level: "warn" }, bindings).warn(
      `ignoring ${LOG_VARIABLE_PREFIX}* settings, logging is off`,
      { issues: z.prettifyError(result.error) },
    )

    return createNullLogger()
  }

  return createPinoLogger({ fd: 2 }, result.data, bindings)
}
