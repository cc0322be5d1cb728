import * as os from 'os'
import type { SignalSource } from './types.js'
import type { RunStatus } from './report.js'

export const HANDLED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP']

export interface Finalizer {
  arm(): void
  run(status: RunStatus): boolean
  dispose(): void
}

export interface FinalizerOptions {
  signals: SignalSource
  exit: (code: number) => void
}

export function signalExitCode(signal: NodeJS.Signals): number {
  const n: number | undefined = os.constants.signals[signal]
  return 128 + (n ?? 1)
}

/**
 * Runs `finalize` exactly once, whichever comes first: an explicit `run()` or
 * one of the handled signals. A signal finalizes and then exits.
 */
export function createFinalizer(finalize: (status: RunStatus) => void, opts: FinalizerOptions): Finalizer {
  let done = false
  const handlers = new Map<NodeJS.Signals, () => void>()

  const dispose = () => {
    for (const [signal, handler] of handlers) opts.signals.removeListener(signal, handler)
    handlers.clear()
  }

  const run = (status: RunStatus): boolean => {
    if (done) return false
    done = true
    dispose()
    finalize(status)
    return true
  }

  return {
    arm() {
      for (const signal of HANDLED_SIGNALS) {
        const handler = () => {
          try {
            run({ kind: 'interrupted', signal })
          } finally {
            opts.exit(signalExitCode(signal))
          }
        }
        handlers.set(signal, handler)
        opts.signals.once(signal, handler)
      }
    },
    run,
    dispose
  }
}
