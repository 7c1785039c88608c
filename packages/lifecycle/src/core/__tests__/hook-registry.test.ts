import { mock } from "vitest-mock-extended"
import type { HookContext, Lifecycle } from "../../ports/hook"
import { HookRegistry } from "../hook-registry"

function makeContext(): HookContext {
  return {
    signal: new AbortController().signal,
    deadlineMs: 30_000,
    timeRemainingMs: 30_000,
    app: { id: "inst-1", name: "billing", version: "1.0.0", endpoints: [] },
  }
}

describe("HookRegistry", () => {
  let registry: HookRegistry

  beforeEach(() => {
    registry = new HookRegistry()
  })

  it("keeps hooks in insertion order", () => {
    registry.register({ name: "a" })
    registry.register({ name: "b" })
    registry.register({ name: "c" })

    expect(registry.hooks().map((h) => h.name)).toStrictEqual(["a", "b", "c"])
    expect(registry.size).toBe(3)
  })

  it("accepts any combination of present and absent callbacks", () => {
    const onStart = vi.fn()
    const onStop = vi.fn()

    registry.register({})
    registry.register({ onStart })
    registry.register({ onStop })
    registry.register({ onStart, onStop })

    expect(registry.hooks()).toStrictEqual([{}, { onStart }, { onStop }, { onStart, onStop }])
  })

  it("returns snapshots that later registrations do not change", () => {
    registry.register({ name: "a" })

    const snapshot = registry.hooks()
    registry.register({ name: "b" })

    expect(snapshot).toHaveLength(1)
    expect(registry.hooks()).toHaveLength(2)
  })

  it("freezes registered hooks", () => {
    const hook = { name: "a" }

    registry.register(hook)

    const [registered] = registry.hooks()
    expect(Object.isFrozen(registered)).toBe(true)
    expect(registered).not.toBe(hook)
  })

  describe("registerCapability", () => {
    it("wraps start and stop into a hook", async () => {
      const component = mock<Lifecycle>()
      const ctx = makeContext()

      registry.registerCapability(component, "db")

      const [hook] = registry.hooks()
      expect(hook?.name).toBe("db")

      await hook?.onStart?.(ctx)
      expect(component.start).toHaveBeenCalledExactlyOnceWith(ctx)
      expect(component.stop).not.toHaveBeenCalled()

      await hook?.onStop?.(ctx)
      expect(component.stop).toHaveBeenCalledExactlyOnceWith(ctx)
    })

    it("propagates the component's failure", async () => {
      const component = mock<Lifecycle>()
      const err = new Error("connect refused")
      component.start.mockRejectedValue(err)

      registry.registerCapability(component)

      const [hook] = registry.hooks()
      expect(hook).not.toHaveProperty("name")
      await expect(hook?.onStart?.(makeContext())).rejects.toBe(err)
    })
  })
})
