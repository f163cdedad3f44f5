import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness): void {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds its own", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "cache" }).child({ cache: "orders" }).info("cleared")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ module: "cache", cache: "orders" })
    })

    it("child() leaves the parent untouched", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "cache" })
      parent.child({ cache: "orders" })

      parent.info("parent")

      expect(read()[0]?.payload).not.toHaveProperty("cache")
    })

    it("per-call meta is emitted alongside the context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ cache: "orders" }).info("drained", { drained: 3 })

      expect(read()[0]?.payload).toMatchObject({ cache: "orders", drained: 3 })
    })

    it("drops entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toStrictEqual(["warn", "error"])
    })
  })
}
