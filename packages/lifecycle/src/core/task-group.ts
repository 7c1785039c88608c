export type Task = () => Promise<void>

export interface TaskGroupObserver {
  /** Called once, with the first error any task reports. */
  onFirstError(err: unknown): void
  /** Called for every distinct error reported after the first. */
  onLateError?(err: unknown): void
}

/**
 * Fan-out/fan-in over concurrently running tasks. Keeps the first error,
 * reports it as soon as it happens, and joins every task before settling.
 */
export class TaskGroup {
  private readonly running: Promise<void>[] = []
  private failure: { error: unknown } | undefined

  constructor(private readonly observer: TaskGroupObserver) {}

  get size(): number {
    return this.running.length
  }

  go(task: Task): void {
    const settled = (async () => {
      await task()
    })().catch((err: unknown) => this.fail(err))

    this.running.push(settled)
  }

  /** Resolves once every task finished; rejects with the first error seen. */
  async wait(): Promise<void> {
    await Promise.all(this.running)

    if (this.failure) throw this.failure.error
  }

  private fail(err: unknown): void {
    if (this.failure) {
      if (err !== this.failure.error) this.observer.onLateError?.(err)
      return
    }

    this.failure = { error: err }
    this.observer.onFirstError(err)
  }
}
