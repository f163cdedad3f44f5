import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  it("waits at least the requested duration", async () => {
    const clock = new SystemClock()
    const start = Date.now()

    await clock.sleep(30)

    expect(Date.now() - start).toBeGreaterThanOrEqual(25)
  })

  it("resolves early when the signal aborts mid-sleep", async () => {
    const clock = new SystemClock()
    const ac = new AbortController()
    const start = Date.now()

    const pending = clock.sleep(5_000, ac.signal)
    setTimeout(() => ac.abort(), 20)
    await pending

    expect(Date.now() - start).toBeLessThan(1_000)
  })

  it("treats non-positive durations as no wait", async () => {
    const clock = new SystemClock()

    await expect(clock.sleep(-5)).resolves.toBeUndefined()
  })
})
