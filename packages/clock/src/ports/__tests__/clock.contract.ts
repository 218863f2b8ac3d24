import type { Clock } from "../clock"

export type ClockContractOptions = {
  name: string
  make: () => Clock
}

export function describeClockContract({ name, make }: ClockContractOptions) {
  describe(`${name} (Clock contract)`, () => {
    it("reports the same instant through now() and nowMs()", () => {
      const clock = make()

      const date = clock.now()
      const ms = clock.nowMs()

      expect(date).toBeInstanceOf(Date)
      expect(Math.abs(date.getTime() - ms)).toBeLessThan(5)
    })

    it("does not run a task scheduled in the future right away", () => {
      const fn = vi.fn()

      const task = make().schedule(60_000, fn)

      expect(fn).not.toHaveBeenCalled()
      task.cancel()
    })

    it("accepts a negative delay", () => {
      const task = make().schedule(-5, () => {})

      expect(() => task.cancel()).not.toThrow()
    })

    it("tolerates cancelling twice", () => {
      const task = make().schedule(60_000, () => {})

      task.cancel()

      expect(() => task.cancel()).not.toThrow()
    })
  })
}
