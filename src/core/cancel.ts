import { setMaxListeners } from 'node:events'

import { CancelledError } from './errors.js'

function reasonOf(signal: AbortSignal): string | undefined {
  const r: unknown = signal.reason
  if (r === undefined) return undefined
  return r instanceof Error ? r.message : String(r)
}

export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) throw new CancelledError(reasonOf(signal))
}

export interface LinkedController {
  controller: AbortController
  /**
   * Detach from the parent once the scope is finished.
   */
  release(): void
}

/**
 * A controller that aborts when `parent` does, and can also be aborted on its own
 * (to stop one spawned sibling without cancelling the whole run).
 */
export function linkedController(parent: AbortSignal): LinkedController {
  const controller = new AbortController()
  if (parent.aborted) {
    controller.abort(parent.reason)
    return { controller, release: () => {} }
  }
  const onAbort = () => controller.abort(parent.reason)
  // One listener per spawned sibling; a wide fan-out is expected.
  setMaxListeners(0, parent)
  parent.addEventListener('abort', onAbort, { once: true })
  return { controller, release: () => parent.removeEventListener('abort', onAbort) }
}

export function neverCancelled(): AbortSignal {
  return new AbortController().signal
}

export interface InterruptHandle {
  signal: AbortSignal
  dispose(): void
}

/**
 * Abort on the first SIGINT/SIGTERM. A second SIGINT falls through to the default handler.
 */
export function interruptSignal(proc: NodeJS.Process = process): InterruptHandle {
  const controller = new AbortController()
  const onSignal = (sig: NodeJS.Signals) => {
    if (controller.signal.aborted && sig === 'SIGINT') {
      dispose()
      proc.kill(proc.pid, 'SIGINT')
      return
    }
    controller.abort(`received ${sig}`)
  }
  const dispose = () => {
    proc.removeListener('SIGINT', onSignal)
    proc.removeListener('SIGTERM', onSignal)
  }
  proc.on('SIGINT', onSignal)
  proc.on('SIGTERM', onSignal)
  return { signal: controller.signal, dispose }
}
