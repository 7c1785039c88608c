import type { AppInfo } from "./app-info"
import type { Milliseconds, UnixMs } from "./time"

export interface HookContext {
  /** Aborts when this callback's own deadline passes. */
  readonly signal: AbortSignal
  readonly deadlineMs: UnixMs
  readonly timeRemainingMs: Milliseconds
  readonly app: AppInfo
}

export type HookFn = (ctx: HookContext) => Promise<void> | void

export interface Hook {
  /** Label used in log output. */
  readonly name?: string
  readonly onStart?: HookFn
  readonly onStop?: HookFn
}

/**
 * A component with a start/stop capability, registered as a single hook.
 */
export interface Lifecycle {
  start(ctx: HookContext): Promise<void> | void
  stop(ctx: HookContext): Promise<void> | void
}

export type HookPhase = "start" | "stop"
