import os from "os"

/** Shell convention for a process ended by a signal: 128 + its number. */
export function signalExitCode(signal: string): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal)
  return entry ? 128 + entry[1] : 1
}

export interface SignalTrap {
  /** Aborted on the first trapped signal; running children are killed through it. */
  signal: AbortSignal
  received(): NodeJS.Signals | null
  dispose(): void
}

/**
 * Record SIGINT/SIGTERM instead of exiting, so that a running git can be
 * stopped and waited on. A second signal exits at once.
 */
export function trapSignals(signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"]): SignalTrap {
  const controller = new AbortController()
  let received: NodeJS.Signals | null = null

  const onSignal = (signal: NodeJS.Signals) => {
    if (received) process.exit(signalExitCode(signal))
    received = signal
    controller.abort()
  }

  for (const signal of signals) process.on(signal, onSignal)

  return {
    signal: controller.signal,
    received: () => received,
    dispose() {
      for (const signal of signals) process.off(signal, onSignal)
    },
  }
}
