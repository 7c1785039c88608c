import { DeadlineExceededError } from "../errors/lifecycle-errors"
import type { AppInfo } from "../ports/app-info"
import type { Clock } from "../ports/clock"
import type { HookContext } from "../ports/hook"
import type { Milliseconds } from "../ports/time"

export interface ScopedHookContext {
  ctx: HookContext
  /** Releases the deadline timer. Does not abort the context. */
  dispose(): void
}

/**
 * Derives a fresh context bounded by `timeoutMs`. It is independent of the
 * run's shared cancellation: only its own deadline aborts it.
 */
export function deriveHookContext(
  clock: Clock,
  timeoutMs: Milliseconds,
  app: AppInfo,
): ScopedHookContext {
  const controller = new AbortController()
  const deadlineMs = clock.nowMs() + timeoutMs

  const cancelTimer = clock.setTimer(timeoutMs, () => {
    controller.abort(new DeadlineExceededError(timeoutMs))
  })

  return {
    ctx: {
      signal: controller.signal,
      deadlineMs,
      timeRemainingMs: timeoutMs,
      app,
    },
    dispose: cancelTimer,
  }
}
