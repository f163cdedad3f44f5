import { createNullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without emitting or throwing", () => {
    const logger = createNullLogger()

    expect(() => {
      logger.trace("x")
      logger.debug("x")
      logger.info("x", { cache: "orders" })
      logger.warn("x")
      logger.error("x", { err: new Error("x") })
      logger.fatal("x")
    }).not.toThrow()
  })

  it("child() returns another no-op logger", () => {
    const child = createNullLogger().child({ cache: "orders" })

    expect(() => child.info("x")).not.toThrow()
  })
})
