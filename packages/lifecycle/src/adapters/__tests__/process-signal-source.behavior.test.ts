import { ProcessSignalSource } from "../process-signal-source"

describe("ProcessSignalSource", () => {
  it("installs one process listener per distinct signal", () => {
    const before = process.listenerCount("SIGUSR2")

    const subscription = new ProcessSignalSource().subscribe(
      ["SIGUSR2", "SIGUSR2"],
      () => {},
    )

    expect(process.listenerCount("SIGUSR2")).toBe(before + 1)

    subscription.unsubscribe()
  })

  it("forwards the received signal name to the listener", () => {
    const listener = vi.fn()

    const subscription = new ProcessSignalSource().subscribe(
      ["SIGUSR2", "SIGWINCH"],
      listener,
    )

    process.emit("SIGWINCH", "SIGWINCH")
    process.emit("SIGUSR2", "SIGUSR2")

    expect(listener.mock.calls).toStrictEqual([["SIGWINCH"], ["SIGUSR2"]])

    subscription.unsubscribe()
  })

  it("unsubscribe removes its listeners and is idempotent", () => {
    const before = process.listenerCount("SIGWINCH")
    const listener = vi.fn()

    const subscription = new ProcessSignalSource().subscribe(["SIGWINCH"], listener)

    subscription.unsubscribe()
    subscription.unsubscribe()

    process.emit("SIGWINCH", "SIGWINCH")

    expect(listener).not.toHaveBeenCalled()
    expect(process.listenerCount("SIGWINCH")).toBe(before)
  })

  it("removes installed listeners when a later signal cannot be watched", () => {
    const before = process.listenerCount("SIGUSR2")

    expect(() =>
      new ProcessSignalSource().subscribe(["SIGUSR2", "SIGKILL"], () => {}),
    ).toThrow()

    expect(process.listenerCount("SIGUSR2")).toBe(before)
  })
})
