import { FakeClock } from "../fake-clock"

describe("FakeClock behavior", () => {
  it("starts at the provided time, or 0", () => {
    expect(new FakeClock(1_000).nowMs()).toBe(1_000)
    expect(new FakeClock().nowMs()).toBe(0)
  })

  it("advance() and set() move virtual time", () => {
    const clock = new FakeClock(0)

    clock.advance(100)
    expect(clock.nowMs()).toBe(100)

    clock.set(5)
    expect(clock.now()).toStrictEqual(new Date(5))
  })

  describe("sleep", () => {
    it("advances virtual time by the slept duration and records it", async () => {
      const clock = new FakeClock(10)

      await clock.sleep(300)
      await clock.sleep(300)

      expect(clock.nowMs()).toBe(610)
      expect(clock.sleeps()).toStrictEqual([300, 300])
    })

    it("does nothing when the signal is already aborted", async () => {
      const clock = new FakeClock(0)
      const ac = new AbortController()
      ac.abort()

      await clock.sleep(300, ac.signal)

      expect(clock.nowMs()).toBe(0)
      expect(clock.sleeps()).toStrictEqual([])
    })
  })
})
