import type { Milliseconds } from "../ports/time"
import { BaseError, type ErrorContext } from "./base-error"

/** Cancellation cause of a run stopped through `stop()` or `requestStop()`. */
export class RunCancelledError extends BaseError<"run_cancelled"> {
  constructor(context?: ErrorContext) {
    super("Run cancelled", { code: "run_cancelled", context })
  }
}

/** Abort reason of a hook context whose deadline passed. */
export class DeadlineExceededError extends BaseError<"deadline_exceeded"> {
  readonly timeoutMs: Milliseconds

  constructor(timeoutMs: Milliseconds, context?: ErrorContext) {
    super(`Deadline of ${timeoutMs}ms exceeded`, {
      code: "deadline_exceeded",
      context: { ...context, timeoutMs },
    })

    this.timeoutMs = timeoutMs
  }
}

export class RunnerBusyError extends BaseError<"runner_busy"> {
  constructor() {
    super("Runner is already running", { code: "runner_busy" })
  }
}

export class ConfigError extends BaseError<"config_invalid"> {
  constructor(message: string, options: { cause?: unknown; context?: ErrorContext } = {}) {
    super(message, { code: "config_invalid", ...options })
  }
}

export function isRunCancelled(err: unknown): err is RunCancelledError {
  return err instanceof RunCancelledError
}

export function isDeadlineExceeded(err: unknown): err is DeadlineExceededError {
  return err instanceof DeadlineExceededError
}
