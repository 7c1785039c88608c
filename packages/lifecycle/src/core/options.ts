import { randomUUID } from "node:crypto"
import { type RunnerConfig, timeoutMsSchema } from "../config/runner-config"
import { ConfigError } from "../errors/lifecycle-errors"
import type { AppInfo } from "../ports/app-info"
import type { SignalName } from "../ports/signal-source"
import type { Milliseconds } from "../ports/time"

export interface RunnerHandle {
  /** Cancels the current run. Idempotent. */
  requestStop(): void
}

export type SignalHandler = (handle: RunnerHandle, signal: SignalName) => void

export interface RunnerOptions {
  /**
   * Instance id exposed to hooks.
   * @default HOOKLINE_SERVICE_ID, else a random UUID
   */
  id?: string
  /** @default HOOKLINE_SERVICE_NAME, else "" */
  name?: string
  /** @default HOOKLINE_SERVICE_VERSION, else "" */
  version?: string
  /** @default HOOKLINE_SERVICE_ENDPOINTS, else [] */
  endpoints?: string[]

  /**
   * Deadline for each start callback.
   * @default 30_000
   */
  startTimeoutMs?: Milliseconds

  /**
   * Deadline for each stop callback.
   * @default 30_000
   */
  stopTimeoutMs?: Milliseconds

  /**
   * Signals to listen for while running. An empty list disables listening.
   * @default ["SIGTERM", "SIGQUIT", "SIGINT"]
   */
  signals?: SignalName[]

  /**
   * Called for every received signal.
   * @default stopOnTermination
   */
  onSignal?: SignalHandler
}

export interface ResolvedRunnerOptions {
  app: AppInfo
  startTimeoutMs: Milliseconds
  stopTimeoutMs: Milliseconds
  signals: readonly SignalName[]
  onSignal: SignalHandler
}

export const TERMINATION_SIGNALS: readonly SignalName[] = ["SIGTERM", "SIGQUIT", "SIGINT"]

const terminationSignals: ReadonlySet<SignalName> = new Set(TERMINATION_SIGNALS)

export function isTerminationSignal(signal: SignalName): boolean {
  return terminationSignals.has(signal)
}

/** Requests stop on SIGINT, SIGQUIT and SIGTERM; ignores anything else. */
export function stopOnTermination(handle: RunnerHandle, signal: SignalName): void {
  if (isTerminationSignal(signal)) handle.requestStop()
}

export const DEFAULTS = {
  startTimeoutMs: 30_000,
  stopTimeoutMs: 30_000,
  signals: TERMINATION_SIGNALS,
  onSignal: stopOnTermination,
} satisfies Omit<ResolvedRunnerOptions, "app">

/**
 * Merges explicit options over environment config over defaults.
 *
 * @throws ConfigError when a timeout is not a positive integer.
 */
export function resolveOptions(
  options: RunnerOptions,
  config: RunnerConfig = {},
): ResolvedRunnerOptions {
  return {
    app: {
      id: options.id || config.id || randomUUID(),
      name: options.name ?? config.name ?? "",
      version: options.version ?? config.version ?? "",
      endpoints: [...(options.endpoints ?? config.endpoints ?? [])],
    },
    startTimeoutMs: resolveTimeout(
      "startTimeoutMs",
      options.startTimeoutMs ?? config.startTimeoutMs ?? DEFAULTS.startTimeoutMs,
    ),
    stopTimeoutMs: resolveTimeout(
      "stopTimeoutMs",
      options.stopTimeoutMs ?? config.stopTimeoutMs ?? DEFAULTS.stopTimeoutMs,
    ),
    signals: [...new Set(options.signals ?? DEFAULTS.signals)],
    onSignal: options.onSignal ?? DEFAULTS.onSignal,
  }
}

function resolveTimeout(key: string, value: Milliseconds): Milliseconds {
  const result = timeoutMsSchema.safeParse(value)

  if (!result.success) {
    throw new ConfigError(`${key} must be a positive integer, got ${value}`, {
      cause: result.error,
      context: { key, value },
    })
  }

  return result.data
}
