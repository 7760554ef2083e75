import { z } from 'zod'

import { ACTION_STATES } from './action.js'
import type { Action, ActionContext, ActionDescription, ActionState } from './action.js'
import { throwIfCancelled } from './cancel.js'
import { toActionError } from './errors.js'

/**
 * The state of a composite, derived from its children.
 */
export function deriveState(children: readonly StatefulAction[]): ActionState {
  const states = children.map(c => c.state)
  if (states.includes('Progress')) return 'Progress'
  const live = states.filter(s => s !== 'Skipped')
  if (live.length === 0) return 'Skipped'
  if (live.every(s => s === 'Completed')) return 'Completed'
  if (live.every(s => s === 'Uncompleted')) return 'Uncompleted'
  return 'Progress'
}

export const StatefulActionJsonSchema = z.object({
  action: z.object({ action_name: z.string().min(1) }).passthrough(),
  state: z.enum(ACTION_STATES).optional(),
})

export type StatefulActionJson = z.infer<typeof StatefulActionJsonSchema>

/**
 * Rebuild a child of a known type from its serialized form.
 */
export function restoreStateful<A extends Action>(
  json: StatefulActionJson,
  tag: string,
  decode: (raw: unknown) => A,
): StatefulAction<A> {
  const { action_name: name, ...params } = json.action
  if (name !== tag) {
    throw new Error(`Expected action \`${tag}\`, found \`${name}\``)
  }
  return new StatefulAction(decode(params), json.state ?? 'Uncompleted')
}

/**
 * An action paired with its lifecycle state. The only caller of `Action.execute`/`Action.revert`.
 *
 * `tryExecute` on a `Completed` or `Skipped` action, and `tryRevert` on an `Uncompleted` or
 * `Skipped` one, return immediately without side effects. A failed call leaves the state at
 * `Progress`. Cancellation seen before the call starts leaves the state as it was; once
 * `execute`/`revert` has begun, a cancellation counts as a failure.
 */
export class StatefulAction<A extends Action = Action> {
  private ownState: ActionState
  private running = false

  constructor(readonly action: A, state: ActionState = 'Uncompleted') {
    this.ownState = state
  }

  static uncompleted<A extends Action>(action: A): StatefulAction<A> {
    return new StatefulAction(action, 'Uncompleted')
  }

  static completed<A extends Action>(action: A): StatefulAction<A> {
    return new StatefulAction(action, 'Completed')
  }

  static skipped<A extends Action>(action: A): StatefulAction<A> {
    return new StatefulAction(action, 'Skipped')
  }

  get state(): ActionState {
    if (this.running) return 'Progress'
    const children = this.action.children?.()
    if (children) return deriveState(children)
    return this.ownState
  }

  get isComposite(): boolean {
    return this.action.children !== undefined
  }

  describeExecute(): ActionDescription[] {
    const state = this.state
    if (state === 'Completed' || state === 'Skipped') return []
    return this.action.executeDescription()
  }

  describeRevert(): ActionDescription[] {
    const state = this.state
    if (state === 'Uncompleted' || state === 'Skipped') return []
    return this.action.revertDescription()
  }

  private scope(ctx: ActionContext): ActionContext {
    return {
      ...ctx,
      logger: ctx.logger.child({ action: this.action.tag, ...this.action.tracingFields() }),
    }
  }

  async tryExecute(ctx: ActionContext): Promise<void> {
    const scoped = this.scope(ctx)
    const synopsis = this.action.tracingSynopsis()
    switch (this.state) {
      case 'Completed':
        scoped.logger.debug(`Completed: (Already done) ${synopsis}`)
        return
      case 'Skipped':
        scoped.logger.debug(`Skipped: ${synopsis}`)
        return
    }

    throwIfCancelled(ctx.signal)
    this.ownState = 'Progress'
    this.running = true
    scoped.logger.debug(`Executing: ${synopsis}`)
    try {
      await this.action.execute(scoped)
    } catch (e) {
      throw toActionError(e)
    } finally {
      this.running = false
    }
    this.ownState = 'Completed'
    scoped.logger.debug(`Completed: ${synopsis}`)
  }

  async tryRevert(ctx: ActionContext): Promise<void> {
    const scoped = this.scope(ctx)
    const synopsis = this.action.tracingSynopsis()
    switch (this.state) {
      case 'Uncompleted':
        scoped.logger.debug(`Reverted: (Already done) ${synopsis}`)
        return
      case 'Skipped':
        scoped.logger.debug(`Skipped: ${synopsis}`)
        return
    }

    throwIfCancelled(ctx.signal)
    this.ownState = 'Progress'
    this.running = true
    scoped.logger.debug(`Reverting: ${synopsis}`)
    try {
      await this.action.revert(scoped)
    } catch (e) {
      throw toActionError(e)
    } finally {
      this.running = false
    }
    this.ownState = 'Uncompleted'
    scoped.logger.debug(`Reverted: ${synopsis}`)
  }

  /**
   * Composites are written without a state: it is recomputed from their children on load.
   */
  toJSON(): StatefulActionJson {
    const action = { action_name: this.action.tag, ...this.action.toJSON() }
    if (this.isComposite) return { action }
    return { action, state: this.state }
  }
}
