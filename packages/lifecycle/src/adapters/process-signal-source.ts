import type {
  SignalListener,
  SignalName,
  SignalSource,
  SignalSubscription,
} from "../ports/signal-source"

type SignalEmitter = Pick<NodeJS.Process, "on" | "off">

export class ProcessSignalSource implements SignalSource {
  constructor(private readonly proc: SignalEmitter = process) {}

  subscribe(
    signals: readonly SignalName[],
    listener: SignalListener,
  ): SignalSubscription {
    const installed: { signal: SignalName; handler: () => void }[] = []

    try {
      for (const signal of new Set(signals)) {
        const handler = () => listener(signal)
        this.proc.on(signal, handler)
        installed.push({ signal, handler })
      }
    } catch (err) {
      for (const { signal, handler } of installed) this.proc.off(signal, handler)

      throw err
    }

    let active = true

    return {
      unsubscribe: () => {
        if (!active) return
        active = false

        for (const { signal, handler } of installed) this.proc.off(signal, handler)
      },
    }
  }
}
