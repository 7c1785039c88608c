export type SignalName = NodeJS.Signals

export type SignalListener = (signal: SignalName) => void

export interface SignalSubscription {
  /** Stops delivery to the listener. Safe to call more than once. */
  unsubscribe(): void
}

/**
 * Delivers OS signals to a listener for as long as the subscription lives.
 */
export interface SignalSource {
  subscribe(signals: readonly SignalName[], listener: SignalListener): SignalSubscription
}
