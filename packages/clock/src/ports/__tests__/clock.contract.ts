import { describe, expect, it } from "vitest"
import type { Clock } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
}

export function describeClockContract(h: ClockHarness): void {
  describe(`${h.name} (Clock contract)`, () => {
    it("now() and nowMs() describe the same instant", () => {
      const clock = h.make()

      const ms = clock.nowMs()
      const date = clock.now()

      expect(date).toBeInstanceOf(Date)
      expect(Math.abs(date.getTime() - ms)).toBeLessThan(5)
    })

    it("sleep(0) resolves", async () => {
      const clock = h.make()

      await expect(clock.sleep(0)).resolves.toBeUndefined()
    })

    it("sleep() resolves right away when the signal is already aborted", async () => {
      const clock = h.make()
      const ac = new AbortController()
      ac.abort()

      await expect(clock.sleep(60_000, ac.signal)).resolves.toBeUndefined()
    })
  })
}
