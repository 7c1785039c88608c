export { FakeClock } from "./adapters/fake-clock"
export { FakeSignalSource } from "./adapters/fake-signal-source"
export { ProcessSignalSource } from "./adapters/process-signal-source"
export { SystemClock } from "./adapters/system-clock"
export {
  DEFAULT_ENV_PREFIX,
  type LoadRunnerConfigOptions,
  loadRunnerConfig,
  type RunnerConfig,
} from "./config/runner-config"
export { HookRegistry } from "./core/hook-registry"
export {
  DEFAULTS,
  isTerminationSignal,
  type RunnerHandle,
  type RunnerOptions,
  type SignalHandler,
  stopOnTermination,
  TERMINATION_SIGNALS,
} from "./core/options"
export {
  createRunner,
  type Runner,
  type RunnerDependencies,
  type RunnerState,
} from "./core/runner"
export { BaseError, type ErrorCode, type ErrorContext, toError } from "./errors/base-error"
export {
  ConfigError,
  DeadlineExceededError,
  isDeadlineExceeded,
  isRunCancelled,
  RunCancelledError,
  RunnerBusyError,
} from "./errors/lifecycle-errors"
export type { AppInfo } from "./ports/app-info"
export type { CancelTimer, Clock, TimeSource, Timers } from "./ports/clock"
export type { Hook, HookContext, HookFn, HookPhase, Lifecycle } from "./ports/hook"
export type {
  SignalListener,
  SignalName,
  SignalSource,
  SignalSubscription,
} from "./ports/signal-source"
export type { Milliseconds, UnixMs } from "./ports/time"
