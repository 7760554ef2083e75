import type { Logger } from '../types.js'
import type { StatefulAction } from './stateful.js'

/**
 * Lifecycle of an action.
 *
 * - `Uncompleted`: not executed yet; execute runs it, revert is a no-op.
 * - `Progress`: an execute or revert is underway, or one was attempted and failed.
 * - `Completed`: executed; revert undoes it, execute is a no-op.
 * - `Skipped`: found already satisfied (or inapplicable) at plan time; both are no-ops.
 */
export type ActionState = 'Uncompleted' | 'Progress' | 'Completed' | 'Skipped'

export const ACTION_STATES = ['Uncompleted', 'Progress', 'Completed', 'Skipped'] as const

/**
 * A human-readable line shown before asking for confirmation.
 */
export interface ActionDescription {
  description: string
  explanation: string[]
}

export function describe(description: string, explanation: string[] = []): ActionDescription {
  return { description, explanation }
}

export interface ActionContext {
  logger: Logger
  signal: AbortSignal
}

/**
 * An idempotent, revertible unit of host mutation.
 *
 * Implementations construct themselves through a static `plan(...)` which does read-only probing
 * and returns a `StatefulAction` in the right starting state. `execute`/`revert` must only be
 * called through `StatefulAction.tryExecute`/`tryRevert`.
 */
export interface Action {
  /**
   * Stable discriminant written to receipts.
   */
  readonly tag: string
  tracingSynopsis(): string
  tracingFields(): Record<string, unknown>
  executeDescription(): ActionDescription[]
  revertDescription(): ActionDescription[]
  execute(ctx: ActionContext): Promise<void>
  revert(ctx: ActionContext): Promise<void>
  /**
   * Present on composite actions. A composite keeps no state of its own; it is derived from these.
   */
  children?(): readonly StatefulAction[]
  /**
   * Parameters (and, for composites, serialized children) without the tag.
   */
  toJSON(): Record<string, unknown>
}
