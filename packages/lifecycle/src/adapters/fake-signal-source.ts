import type {
  SignalListener,
  SignalName,
  SignalSource,
  SignalSubscription,
} from "../ports/signal-source"

type Subscriber = {
  signals: ReadonlySet<SignalName>
  listener: SignalListener
}

/**
 * In-process signal source for tests; `emit()` stands in for the OS.
 */
export class FakeSignalSource implements SignalSource {
  private readonly subscribers = new Set<Subscriber>()

  subscribe(
    signals: readonly SignalName[],
    listener: SignalListener,
  ): SignalSubscription {
    const subscriber: Subscriber = { signals: new Set(signals), listener }

    this.subscribers.add(subscriber)

    return {
      unsubscribe: () => {
        this.subscribers.delete(subscriber)
      },
    }
  }

  /** Returns the number of listeners the signal was delivered to. */
  emit(signal: SignalName): number {
    let delivered = 0

    for (const { signals, listener } of [...this.subscribers]) {
      if (!signals.has(signal)) continue

      listener(signal)
      delivered++
    }

    return delivered
  }

  get listenerCount(): number {
    return this.subscribers.size
  }
}
