import { FakeClock } from "../../adapters/fake-clock"
import { DeadlineExceededError } from "../../errors/lifecycle-errors"
import type { AppInfo } from "../../ports/app-info"
import { deriveHookContext } from "../hook-context"

describe("deriveHookContext", () => {
  const app: AppInfo = { id: "inst-1", name: "billing", version: "1.0.0", endpoints: [] }

  let clock: FakeClock

  beforeEach(() => {
    clock = new FakeClock(1_000)
  })

  it("exposes the deadline, the budget and the app info", () => {
    const { ctx } = deriveHookContext(clock, 500, app)

    expect(ctx.deadlineMs).toBe(1_500)
    expect(ctx.timeRemainingMs).toBe(500)
    expect(ctx.app).toBe(app)
    expect(ctx.signal.aborted).toBe(false)
  })

  it("aborts with DeadlineExceededError when the deadline passes", () => {
    const { ctx } = deriveHookContext(clock, 100, app)

    clock.advance(99)
    expect(ctx.signal.aborted).toBe(false)

    clock.advance(1)
    expect(ctx.signal.aborted).toBe(true)
    expect(ctx.signal.reason).toBeInstanceOf(DeadlineExceededError)
    expect(ctx.signal.reason).toMatchObject({ timeoutMs: 100 })
  })

  it("dispose releases the timer without aborting", () => {
    const { ctx, dispose } = deriveHookContext(clock, 100, app)

    dispose()
    clock.advance(1_000)

    expect(ctx.signal.aborted).toBe(false)
    expect(clock.pendingTimers).toBe(0)
  })

  it("keeps deadlines of sibling contexts independent", () => {
    const short = deriveHookContext(clock, 50, app)
    const long = deriveHookContext(clock, 200, app)

    clock.advance(50)

    expect(short.ctx.signal.aborted).toBe(true)
    expect(long.ctx.signal.aborted).toBe(false)
  })
})
