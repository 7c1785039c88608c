import type { CancelTimer, Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

const MAX_TIMER_MS: Milliseconds = 2_147_483_647

export class SystemClock implements Clock {
  nowMs(): UnixMs {
    return Date.now()
  }

  setTimer(ms: Milliseconds, fn: () => void): CancelTimer {
    const timer = setTimeout(fn, Math.min(Math.max(0, ms), MAX_TIMER_MS))

    return () => clearTimeout(timer)
  }
}
