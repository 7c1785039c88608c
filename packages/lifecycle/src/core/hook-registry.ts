import type { Hook, Lifecycle } from "../ports/hook"

/**
 * Append-only, ordered set of hooks. Order only decides the order tasks are
 * spawned in; hooks still run concurrently.
 */
export class HookRegistry {
  private readonly entries: Hook[] = []

  get size(): number {
    return this.entries.length
  }

  register(hook: Hook): void {
    this.entries.push(Object.freeze({ ...hook }))
  }

  registerCapability(component: Lifecycle, name?: string): void {
    this.register({
      ...(name !== undefined && { name }),
      onStart: (ctx) => component.start(ctx),
      onStop: (ctx) => component.stop(ctx),
    })
  }

  hooks(): readonly Hook[] {
    return [...this.entries]
  }
}
