import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "locator" })
      const child = parent.child({ field: "server.port" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.message).toBe("hello")
      expect(logs[0]?.context).toEqual({
        module: "locator",
        field: "server.port",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ field: "a.b" })
      const child = parent.child({ field: "a.c" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.context.field).toBe("a.c")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ module: "loader" })
      const child = parent.child({ path: "/tmp/app.toml" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.context).toEqual({ module: "loader" })
      expect(logs[1]?.context).toEqual({ module: "loader", path: "/tmp/app.toml" })

      clear()
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const scoped = logger.child({ origin: "manifest" })
      scoped.info("hello", { origin: "override" })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.context.origin).toBe("override")
    })

    it("keeps non-context meta out of the context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ field: "a.c.d" }).debug("config value resolved", { kind: "integer" })

      const [log] = read()

      expect(log?.level).toBe("debug")
      expect(log?.context).toEqual({ field: "a.c.d" })
      expect(log?.payload.kind).toBe("integer")
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })
  })
}
