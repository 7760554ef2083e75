import type { ActionContext, ActionDescription } from './action.js'
import {
  ActionError,
  CancelledError,
  FailedRevertsError,
  collectErrors,
  toActionError,
  wrapChildError,
} from './errors.js'
import { neverCancelled } from './cancel.js'
import type { StatefulAction } from './stateful.js'
import { joinAll } from './task.js'

/**
 * How a composite drives its children. Chosen by the composite's author from the real
 * dependencies between children; the engine never infers it.
 */
export type FanOut = 'sequential' | 'concurrent'

function wrap(child: StatefulAction, e: unknown): ActionError {
  return wrapChildError(child.action.tag, child.action.tracingSynopsis(), toActionError(e))
}

/**
 * Execute children one at a time in declared order, stopping at the first failure.
 */
export async function executeSequential(children: readonly StatefulAction[], ctx: ActionContext): Promise<void> {
  for (const child of children) {
    try {
      await child.tryExecute(ctx)
    } catch (e) {
      throw wrap(child, e)
    }
  }
}

/**
 * Revert children in reverse declared order. Every child is attempted; errors are collected.
 */
export async function revertSequential(children: readonly StatefulAction[], ctx: ActionContext): Promise<void> {
  const errors: ActionError[] = []
  for (const child of [...children].reverse()) {
    try {
      await child.tryRevert(ctx)
    } catch (e) {
      errors.push(wrap(child, e))
    }
  }
  const err = collectErrors(errors)
  if (err) throw err
}

/**
 * Execute independent children as separate tasks and wait for all of them.
 *
 * If any child fails, the children that succeeded are reverted before returning, and a failure
 * to revert them is reported as a `FailedRevertsError`. Cancellation alone reverts nothing. When
 * a real failure coincides with a cancellation, the siblings are still reverted, outside the
 * cancelled scope.
 */
export async function executeConcurrent(children: readonly StatefulAction[], ctx: ActionContext): Promise<void> {
  const outcomes = await joinAll(ctx, children.map(child => (taskCtx: ActionContext) => child.tryExecute(taskCtx)))

  const failures: ActionError[] = []
  const succeeded: StatefulAction[] = []
  outcomes.forEach((outcome, idx) => {
    const child = children[idx]
    if (outcome.ok) succeeded.push(child)
    else failures.push(wrap(child, outcome.error))
  })

  const primary = collectErrors(failures)
  if (!primary) return
  if (failures.every((f): boolean => f instanceof CancelledError)) throw failures[0]

  ctx.logger.warn(`Reverting ${succeeded.length} completed sibling(s) after ${failures.length} failure(s)`)
  const cleanupCtx: ActionContext = { ...ctx, signal: neverCancelled() }
  const reverts = await joinAll(cleanupCtx, succeeded.map(child => (taskCtx: ActionContext) => child.tryRevert(taskCtx)))
  const revertErrors: ActionError[] = []
  reverts.forEach((outcome, idx) => {
    if (!outcome.ok) revertErrors.push(wrap(succeeded[idx], outcome.error))
  })
  if (revertErrors.length) throw new FailedRevertsError(primary, revertErrors)
  throw primary
}

/**
 * Revert independent children as separate tasks. Every child is attempted; errors are collected.
 */
export async function revertConcurrent(children: readonly StatefulAction[], ctx: ActionContext): Promise<void> {
  const outcomes = await joinAll(ctx, children.map(child => (taskCtx: ActionContext) => child.tryRevert(taskCtx)))
  const errors: ActionError[] = []
  outcomes.forEach((outcome, idx) => {
    if (!outcome.ok) errors.push(wrap(children[idx], outcome.error))
  })
  const err = collectErrors(errors)
  if (err) throw err
}

export function executeChildren(fanOut: FanOut, children: readonly StatefulAction[], ctx: ActionContext): Promise<void> {
  return fanOut === 'concurrent' ? executeConcurrent(children, ctx) : executeSequential(children, ctx)
}

export function revertChildren(fanOut: FanOut, children: readonly StatefulAction[], ctx: ActionContext): Promise<void> {
  return fanOut === 'concurrent' ? revertConcurrent(children, ctx) : revertSequential(children, ctx)
}

export function describeExecuteAll(children: readonly StatefulAction[]): ActionDescription[] {
  return children.flatMap(c => c.describeExecute())
}

export function describeRevertAll(children: readonly StatefulAction[]): ActionDescription[] {
  return [...children].reverse().flatMap(c => c.describeRevert())
}
