import { isDeepStrictEqual } from 'node:util'
import { ZodError } from 'zod'

import { decodeStatefulAction } from '../actions/registry.js'
import { createPlanner, isPlannerTag } from '../planner/index.js'
import type { PlanContext, Planner, PlannerTag } from '../planner/index.js'
import { RECEIPT_VERSION, ReceiptSchema } from '../receipt/types.js'
import type { ReceiptJson } from '../receipt/types.js'
import { parseSettings } from '../settings.js'
import type { CommonSettings } from '../settings.js'
import type { ActionContext, ActionDescription } from './action.js'
import { describeExecuteAll, describeRevertAll, executeSequential, revertSequential } from './compose.js'
import { ActionError, CancelledError, ChildrenActionError, revertFailuresOf, toActionError } from './errors.js'
import { formatDescriptions, formatSettings } from './format-plan.js'
import type { StatefulAction } from './stateful.js'

export type PlanErrorKind =
  | 'receipt_mismatch'
  | 'receipt_invalid'
  | 'receipt_version'
  | 'action'
  | 'cancelled'
  | 'revert_failures'

export class PlanError extends Error {
  readonly kind: PlanErrorKind
  /**
   * Failures hit while undoing changes, when there were any.
   */
  readonly revertErrors: ActionError[]

  constructor(kind: PlanErrorKind, message: string, options: { cause?: unknown; revertErrors?: ActionError[] } = {}) {
    super(message, { cause: options.cause })
    this.name = 'PlanError'
    this.kind = kind
    this.revertErrors = options.revertErrors ?? []
  }
}

export interface PlannerRecord {
  planner: PlannerTag
  settings: CommonSettings
}

// Settings go through JSON so that a missing optional and an `undefined` one compare equal.
function normalized(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value))
}

function describeZod(e: ZodError): string {
  return e.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')
}

/**
 * The ordered top-level actions of an install, with the planner that produced them.
 * The same value is persisted as the receipt.
 */
export class InstallPlan {
  readonly version = RECEIPT_VERSION

  constructor(readonly planner: PlannerRecord, readonly actions: StatefulAction[]) {}

  static async plan(planner: Planner, ctx: PlanContext): Promise<InstallPlan> {
    const actions = await planner.plan(ctx)
    return new InstallPlan({ planner: planner.tag, settings: planner.settings() }, actions)
  }

  /**
   * Decode a receipt. An unknown version or a document that does not validate is rejected
   * as a whole.
   */
  static fromJSON(raw: unknown): InstallPlan {
    const version = typeof raw === 'object' && raw !== null && 'version' in raw ? raw.version : undefined
    if (version !== RECEIPT_VERSION) {
      throw new PlanError('receipt_version', `Unsupported receipt version: ${String(version)} (expected ${RECEIPT_VERSION})`)
    }
    const parsed = ReceiptSchema.safeParse(raw)
    if (!parsed.success) {
      throw new PlanError('receipt_invalid', `Invalid receipt: ${describeZod(parsed.error)}`, { cause: parsed.error })
    }
    const { planner, settings } = parsed.data.planner
    if (!isPlannerTag(planner)) {
      throw new PlanError('receipt_invalid', `Invalid receipt: unknown planner \`${planner}\``)
    }
    try {
      return new InstallPlan(
        { planner, settings: parseSettings(settings) },
        parsed.data.actions.map(decodeStatefulAction),
      )
    } catch (e) {
      const detail = e instanceof ZodError ? describeZod(e) : e instanceof Error ? e.message : String(e)
      throw new PlanError('receipt_invalid', `Invalid receipt: ${detail}`, { cause: e })
    }
  }

  toJSON(): ReceiptJson {
    return {
      version: this.version,
      planner: { planner: this.planner.planner, settings: this.planner.settings },
      actions: this.actions.map(a => a.toJSON()),
    }
  }

  /**
   * Refuse to drive this plan for a different planner or configuration than requested.
   */
  checkCompatible(expected: PlannerRecord): void {
    if (expected.planner !== this.planner.planner) {
      throw new PlanError(
        'receipt_mismatch',
        `Found existing plan for planner \`${this.planner.planner}\`, which differs from the requested \`${expected.planner}\``,
      )
    }
    if (!isDeepStrictEqual(normalized(expected.settings), normalized(this.planner.settings))) {
      throw new PlanError(
        'receipt_mismatch',
        `Found existing plan for planner \`${this.planner.planner}\` with different settings than requested; uninstall it first`,
      )
    }
  }

  /**
   * Every top-level action is done (or was never needed).
   */
  isComplete(): boolean {
    return this.actions.every(a => a.state === 'Completed' || a.state === 'Skipped')
  }

  describeInstall(explain = false): string {
    return this.describe('install', describeExecuteAll(this.actions), explain)
  }

  describeUninstall(explain = false): string {
    return this.describe('uninstall', describeRevertAll(this.actions), explain)
  }

  private describe(operation: string, descriptions: ActionDescription[], explain: boolean): string {
    return [
      `Nix ${operation} plan (planner: ${this.planner.planner})`,
      '',
      'Planner settings:',
      '',
      formatSettings(this.planner.settings),
      '',
      `The following actions will be taken${explain ? '' : ' (`--explain` for more context)'}:`,
      '',
      formatDescriptions(descriptions, explain),
    ].join('\n')
  }

  /**
   * Execute the top-level actions in order, stopping at the first failure. The plan does not
   * revert itself; that is for the caller to offer.
   */
  async install(ctx: ActionContext): Promise<void> {
    try {
      await executeSequential(this.actions, ctx)
    } catch (e) {
      throw classify('Install', toActionError(e))
    }
  }

  /**
   * Revert the top-level actions in reverse order. Every action is attempted.
   */
  async uninstall(ctx: ActionContext): Promise<void> {
    try {
      await revertSequential(this.actions, ctx)
    } catch (e) {
      const err = toActionError(e)
      if (err instanceof CancelledError) throw new PlanError('cancelled', err.message, { cause: err })
      throw new PlanError('revert_failures', `Uninstall failed: ${err.message}`, {
        cause: err,
        revertErrors: err instanceof ChildrenActionError ? err.errors : [err],
      })
    }
  }
}

function classify(operation: string, err: ActionError): PlanError {
  if (err instanceof CancelledError) return new PlanError('cancelled', err.message, { cause: err })
  const revertErrors = revertFailuresOf(err)
  if (revertErrors.length) {
    return new PlanError('revert_failures', `${operation} failed and could not be cleaned up: ${err.message}`, { cause: err, revertErrors })
  }
  return new PlanError('action', `${operation} failed: ${err.message}`, { cause: err })
}

/**
 * Plan from the named planner with the given settings.
 */
export async function planWith(tag: PlannerTag, settings: CommonSettings, ctx: PlanContext): Promise<InstallPlan> {
  return InstallPlan.plan(createPlanner(tag, settings), ctx)
}
