import type { Milliseconds, UnixMs } from "./time"

export type CancelTimer = () => void

export interface TimeSource {
  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}

export interface Timers {
  /**
   * Runs `fn` once after `ms` milliseconds.
   * The returned function cancels the timer; calling it after it fired is a no-op.
   */
  setTimer(ms: Milliseconds, fn: () => void): CancelTimer
}

export type Clock = TimeSource & Timers
