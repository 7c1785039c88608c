import type { CancelTimer, Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

type PendingTimer = {
  dueMs: UnixMs
  fn: () => void
}

/**
 * Manually driven clock. Timers only fire from `advance()`, in due order.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private timers: PendingTimer[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  nowMs(): UnixMs {
    return this.time
  }

  setTimer(ms: Milliseconds, fn: () => void): CancelTimer {
    const timer: PendingTimer = { dueMs: this.time + Math.max(0, ms), fn }

    this.timers.push(timer)

    return () => this.remove(timer)
  }

  advance(ms: Milliseconds): void {
    const target = this.time + ms

    for (let next = this.nextDue(target); next; next = this.nextDue(target)) {
      this.remove(next)
      this.time = next.dueMs
      next.fn()
    }

    this.time = target
  }

  get pendingTimers(): number {
    return this.timers.length
  }

  private nextDue(limit: UnixMs): PendingTimer | undefined {
    let next: PendingTimer | undefined

    for (const timer of this.timers) {
      if (timer.dueMs > limit) continue
      if (!next || timer.dueMs < next.dueMs) next = timer
    }

    return next
  }

  private remove(timer: PendingTimer): void {
    this.timers = this.timers.filter((t) => t !== timer)
  }
}
