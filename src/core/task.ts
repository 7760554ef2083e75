import { setImmediate as nextTick } from 'node:timers/promises'

import type { ActionContext } from './action.js'
import { linkedController } from './cancel.js'
import { ActionError, JoinError } from './errors.js'

export type TaskOutcome<T> = { ok: true; value: T } | { ok: false; error: ActionError }

export interface TaskHandle<T> {
  readonly outcome: Promise<TaskOutcome<T>>
  /**
   * Stop the task at its next cancellation point. Does not wait for it.
   */
  abort(reason?: string): void
}

/**
 * Run `run` as its own task with its own cancellation scope under `ctx.signal`.
 *
 * The outcome never rejects: action failures come back as `{ ok: false }`, and anything
 * that is not an `ActionError` is reported as a `JoinError`.
 */
export function spawnTask<T>(ctx: ActionContext, run: (ctx: ActionContext) => Promise<T>): TaskHandle<T> {
  const { controller, release } = linkedController(ctx.signal)
  const taskCtx: ActionContext = { ...ctx, signal: controller.signal }
  const outcome = nextTick()
    .then(() => run(taskCtx))
    .then(
      (value): TaskOutcome<T> => ({ ok: true, value }),
      (e: unknown): TaskOutcome<T> => ({ ok: false, error: e instanceof ActionError ? e : new JoinError(e) }),
    )
    .finally(release)
  return {
    outcome,
    abort: (reason?: string) => controller.abort(reason ?? 'no longer needed'),
  }
}

/**
 * Spawn every job, wait for all of them, and return their outcomes in input order.
 */
export async function joinAll<T>(ctx: ActionContext, jobs: Array<(ctx: ActionContext) => Promise<T>>): Promise<TaskOutcome<T>[]> {
  const handles = jobs.map(job => spawnTask(ctx, job))
  return Promise.all(handles.map(h => h.outcome))
}
