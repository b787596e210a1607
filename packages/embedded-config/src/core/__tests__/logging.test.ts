import { NullLogger, PinoLogger } from "@embedcfg/logger"
import { loggerFromEnv } from "../logging"

describe("loggerFromEnv", () => {
  it("stays silent when no level is configured", () => {
    expect(loggerFromEnv({})).toBeInstanceOf(NullLogger)
    expect(loggerFromEnv({ EMBEDCFG_LOG_LEVEL: "" })).toBeInstanceOf(NullLogger)
  })

  it("creates a pino logger when a level is configured", () => {
    expect(loggerFromEnv({ EMBEDCFG_LOG_LEVEL: "debug" })).toBeInstanceOf(PinoLogger)
  })

  it("creates a pretty-printing pino logger", () => {
    const env = { EMBEDCFG_LOG_LEVEL: "debug", EMBEDCFG_LOG_PRETTY: "true" }

    expect(loggerFromEnv(env)).toBeInstanceOf(PinoLogger)
  })

  it("reuses one logger while the settings stay the same", () => {
    const env = { EMBEDCFG_LOG_LEVEL: "info", EMBEDCFG_LOG_PRETTY: "1" }

    const first = loggerFromEnv(env)

    expect(loggerFromEnv({ ...env })).toBe(first)
    expect(loggerFromEnv({ EMBEDCFG_LOG_LEVEL: "warn" })).not.toBe(first)
  })

  it("falls back to no logging for an unknown level", () => {
    expect(loggerFromEnv({ EMBEDCFG_LOG_LEVEL: "loud" })).toBeInstanceOf(NullLogger)
  })

  it("falls back to no logging for an unknown prettify value", () => {
    const env = { EMBEDCFG_LOG_LEVEL: "info", EMBEDCFG_LOG_PRETTY: "yes" }

    expect(loggerFromEnv(env)).toBeInstanceOf(NullLogger)
  })
})
