import { FakeClock } from "../fake-clock"

describe("FakeClock", () => {
  it("starts at the given time and only moves on advance()", () => {
    const clock = new FakeClock(1_000)

    expect(clock.nowMs()).toBe(1_000)

    clock.advance(250)

    expect(clock.nowMs()).toBe(1_250)
  })

  it("fires timers once they fall due, not before", () => {
    const clock = new FakeClock(0)
    const fn = vi.fn()

    clock.setTimer(100, fn)

    clock.advance(99)
    expect(fn).not.toHaveBeenCalled()

    clock.advance(1)
    expect(fn).toHaveBeenCalledOnce()
    expect(clock.pendingTimers).toBe(0)
  })

  it("fires due timers in due order and exposes the due time while firing", () => {
    const clock = new FakeClock(0)
    const fired: string[] = []

    clock.setTimer(30, () => fired.push(`late@${clock.nowMs()}`))
    clock.setTimer(10, () => fired.push(`early@${clock.nowMs()}`))

    clock.advance(50)

    expect(fired).toStrictEqual(["early@10", "late@30"])
    expect(clock.nowMs()).toBe(50)
  })

  it("fires timers scheduled by another timer within the same advance", () => {
    const clock = new FakeClock(0)
    const fired: string[] = []

    clock.setTimer(10, () => {
      fired.push(`a@${clock.nowMs()}`)
      clock.setTimer(5, () => fired.push(`b@${clock.nowMs()}`))
    })

    clock.advance(20)

    expect(fired).toStrictEqual(["a@10", "b@15"])
  })

  it("cancelled timers never fire", () => {
    const clock = new FakeClock(0)
    const fn = vi.fn()

    const cancel = clock.setTimer(10, fn)
    cancel()
    cancel()

    clock.advance(100)

    expect(fn).not.toHaveBeenCalled()
    expect(clock.pendingTimers).toBe(0)
  })
})
