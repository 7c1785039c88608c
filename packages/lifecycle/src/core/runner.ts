import { randomUUID } from "node:crypto"
import { createNullLogger, type Logger } from "@hookline/logger"
import { ProcessSignalSource } from "../adapters/process-signal-source"
import { SystemClock } from "../adapters/system-clock"
import { loadRunnerConfig, type RunnerConfig } from "../config/runner-config"
import { RunCancelledError, RunnerBusyError } from "../errors/lifecycle-errors"
import type { AppInfo } from "../ports/app-info"
import type { Clock } from "../ports/clock"
import type { Hook, Lifecycle } from "../ports/hook"
import type { SignalSource } from "../ports/signal-source"
import { type CancelScope, createCancelScope } from "./cancel-scope"
import { HookRegistry } from "./hook-registry"
import { type RunnerHandle, type RunnerOptions, resolveOptions } from "./options"
import { executeRun } from "./run"

export type RunnerState = "idle" | "running" | "stopping" | "terminated"

export interface RunnerDependencies {
  /** @default NullLogger */
  logger?: Logger
  /** @default SystemClock */
  clock?: Clock
  /** @default ProcessSignalSource */
  signals?: SignalSource
  /** @default loadRunnerConfig() */
  config?: RunnerConfig
}

export interface Runner {
  readonly state: RunnerState
  readonly info: AppInfo

  register(hook: Hook): void
  registerCapability(component: Lifecycle, name?: string): void

  /**
   * Starts every hook and blocks until shutdown completes.
   * Rejects with the first error any start, stop or signal task reported.
   */
  run(): Promise<void>

  /** Cancels the active run, if any. Never throws. */
  stop(): void
}

export function createRunner(
  deps: RunnerDependencies = {},
  options: RunnerOptions = {},
): Runner {
  const resolved = resolveOptions(options, deps.config ?? loadRunnerConfig())

  const clock = deps.clock ?? new SystemClock()
  const signals = deps.signals ?? new ProcessSignalSource()
  const logger: Logger = (deps.logger ?? createNullLogger()).child({
    service: resolved.app.name,
    version: resolved.app.version,
    instanceId: resolved.app.id,
  })

  const registry = new HookRegistry()

  let state: RunnerState = "idle"
  let scope: CancelScope | undefined

  const handle: RunnerHandle = {
    requestStop: () => runner.stop(),
  }

  const runner: Runner = {
    get state() {
      return state
    },

    info: resolved.app,

    register(hook) {
      registry.register(hook)
    },

    registerCapability(component, name) {
      registry.registerCapability(component, name)
    },

    stop() {
      scope?.cancel(new RunCancelledError())
    },

    async run() {
      if (scope) throw new RunnerBusyError()

      const current = createCancelScope()
      const runLogger: Logger = logger.child({ runId: randomUUID() })

      current.signal.addEventListener(
        "abort",
        () => {
          state = "stopping"
          runLogger.warn("Shutting down", { err: current.signal.reason })
        },
        { once: true },
      )

      scope = current
      state = "running"
      runLogger.info("Starting hooks", { hookCount: registry.size })

      try {
        await executeRun({
          hooks: registry.hooks(),
          scope: current,
          handle,
          options: resolved,
          clock,
          signals,
          logger: runLogger,
        })

        runLogger.info("Run complete")
      } catch (err) {
        runLogger.error("Run failed", { err })

        throw err
      } finally {
        scope = undefined
        state = "terminated"
      }
    },
  }

  return runner
}
