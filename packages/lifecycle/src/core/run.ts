import type { Logger } from "@hookline/logger"
import { toError } from "../errors/base-error"
import type { Clock } from "../ports/clock"
import type { Hook, HookFn, HookPhase } from "../ports/hook"
import type { SignalSource } from "../ports/signal-source"
import type { Milliseconds } from "../ports/time"
import { type CancelScope, waitForCancel } from "./cancel-scope"
import { deriveHookContext } from "./hook-context"
import type { ResolvedRunnerOptions, RunnerHandle } from "./options"
import { type Task, TaskGroup } from "./task-group"

export interface RunContext {
  hooks: readonly Hook[]
  scope: CancelScope
  handle: RunnerHandle
  options: ResolvedRunnerOptions
  clock: Clock
  signals: SignalSource
  logger: Logger
}

interface HookCall {
  label: string
  phase: HookPhase
  timeoutMs: Milliseconds
  fn: HookFn
}

/**
 * Spawns one task per start and stop callback, plus a signal listener, then
 * joins them all. The first failure cancels the shared scope, which releases
 * every pending stop task.
 */
export async function executeRun(ctx: RunContext): Promise<void> {
  const group = new TaskGroup({
    onFirstError: (err) => ctx.scope.cancel(err),
    onLateError: (err) =>
      ctx.logger.warn("Error reported after the run already failed", { err }),
  })

  for (const task of buildTasks(ctx)) group.go(task)

  if (ctx.options.signals.length > 0) {
    group.go(() => listenForSignals(ctx))
  } else {
    group.go(() => awaitCancel(ctx))
  }

  await group.wait()
}

function buildTasks(ctx: RunContext): Task[] {
  const { startTimeoutMs, stopTimeoutMs } = ctx.options
  const tasks: Task[] = []

  ctx.hooks.forEach((hook, index) => {
    const label = hook.name ?? `hook#${index}`

    if (hook.onStop) {
      const call: HookCall = { label, phase: "stop", timeoutMs: stopTimeoutMs, fn: hook.onStop }

      tasks.push(async () => {
        await waitForCancel(ctx.scope.signal)
        await invokeHook(ctx, call)
      })
    }

    if (hook.onStart) {
      const call: HookCall = {
        label,
        phase: "start",
        timeoutMs: startTimeoutMs,
        fn: hook.onStart,
      }

      tasks.push(() => invokeHook(ctx, call))
    }
  })

  return tasks
}

async function invokeHook(ctx: RunContext, call: HookCall): Promise<void> {
  const logger = ctx.logger.child({ hook: call.label, phase: call.phase })
  const scoped = deriveHookContext(ctx.clock, call.timeoutMs, ctx.options.app)
  const startedMs = ctx.clock.nowMs()

  try {
    await call.fn(scoped.ctx)

    logger.debug(`Executed ${call.phase} hook: ${call.label}`, {
      durationMs: ctx.clock.nowMs() - startedMs,
    })
  } catch (err) {
    logger.error(`${capitalize(call.phase)} hook failed: ${call.label}`, {
      err,
      timeoutMs: call.timeoutMs,
    })

    throw toError(err)
  } finally {
    scoped.dispose()
  }
}

/**
 * Delivers configured signals to `onSignal` until the shared scope is
 * cancelled, then fails with the cancellation cause.
 */
async function listenForSignals(ctx: RunContext): Promise<void> {
  const { signals, onSignal } = ctx.options

  let handlerFailed: (err: Error) => void = () => {}
  const handlerFailure = new Promise<never>((_, reject) => {
    handlerFailed = reject
  })

  const subscription = ctx.signals.subscribe(signals, (signal) => {
    ctx.logger.info("Received signal", { signal })

    try {
      onSignal(ctx.handle, signal)
    } catch (err) {
      handlerFailed(toError(err))
    }
  })

  try {
    const cause = await Promise.race([waitForCancel(ctx.scope.signal), handlerFailure])

    throw toError(cause)
  } finally {
    subscription.unsubscribe()
  }
}

async function awaitCancel(ctx: RunContext): Promise<void> {
  await waitForCancel(ctx.scope.signal)
}

function capitalize(s: string): string {
  return s.length ? s.charAt(0).toUpperCase() + s.slice(1) : s
}
