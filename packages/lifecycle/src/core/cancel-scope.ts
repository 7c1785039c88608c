/**
 * One-shot cancellation shared by every task of a run. The first cause wins;
 * later `cancel()` calls are no-ops.
 */
export interface CancelScope {
  readonly signal: AbortSignal
  readonly cancelled: boolean
  /** Returns true if this call performed the cancellation. */
  cancel(cause: unknown): boolean
}

export function createCancelScope(): CancelScope {
  const controller = new AbortController()

  return {
    signal: controller.signal,
    get cancelled() {
      return controller.signal.aborted
    },
    cancel(cause) {
      if (controller.signal.aborted) return false

      controller.abort(cause)
      return true
    },
  }
}

/** Resolves with the abort reason once `signal` aborts. */
export function waitForCancel(signal: AbortSignal): Promise<unknown> {
  if (signal.aborted) return Promise.resolve(signal.reason)

  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(signal.reason), { once: true })
  })
}
