import type { CommonOptions, Operation, Result } from '../types.js'
import type { ActionContext } from './action.js'
import { tryAppendAudit } from './audit.js'
import { neverCancelled } from './cancel.js'
import { toActionError } from './errors.js'
import { noopLogger } from './log.js'
import { PlanError } from './plan.js'
import type { InstallPlan } from './plan.js'

function nowIso() {
  return new Date().toISOString()
}

export function mkResult(operation: Operation, receiptPath?: string): Result {
  const now = nowIso()
  return {
    ok: true,
    operation,
    receiptPath,
    startedAt: now,
    finishedAt: now,
    durationMs: 0,
    actions: [],
    warnings: [],
    errors: [],
    revertErrors: [],
    cancelled: false,
  }
}

/**
 * Record a failure on `result`. Plan errors carry their revert failures and cancellation
 * separately; anything else is reported by message.
 */
export function recordFailure(result: Result, e: unknown): void {
  result.ok = false
  if (e instanceof PlanError) {
    result.errors.push(e.message)
    result.revertErrors.push(...e.revertErrors.map(r => r.message))
    if (e.kind === 'cancelled') result.cancelled = true
    return
  }
  result.errors.push(toActionError(e).message)
}

export interface RunOperationInput {
  operation: Operation
  receiptPath?: string
  plan: InstallPlan
  opts?: CommonOptions
  /**
   * Drives the plan. Not called for a dry run.
   */
  run?: (ctx: ActionContext) => Promise<void>
  /**
   * Called after the run (or dry-run) but before the audit line is appended.
   * Lets callers persist the receipt and mark failure.
   */
  finalize?: (result: Result) => Promise<Result> | Result
}

export async function runOperation(input: RunOperationInput): Promise<Result> {
  const startedMs = Date.now()
  const logger = input.opts?.logger ?? noopLogger()
  let res = mkResult(input.operation, input.receiptPath)

  if (input.opts?.includePlanText) {
    res.planText = input.operation === 'uninstall'
      ? input.plan.describeUninstall(input.opts.explain)
      : input.plan.describeInstall(input.opts.explain)
  }

  if (input.run && !input.opts?.dryRun) {
    const ctx: ActionContext = { logger, signal: input.opts?.signal ?? neverCancelled() }
    try {
      await input.run(ctx)
    } catch (e) {
      recordFailure(res, e)
    }
  }

  res.actions = input.plan.actions.map(a => ({
    action: a.action.tag,
    synopsis: a.action.tracingSynopsis(),
    state: a.state,
  }))
  res.durationMs = Date.now() - startedMs
  res.finishedAt = nowIso()

  if (input.finalize) {
    res = await input.finalize(res)
  }

  res = await tryAppendAudit(res, input.opts)

  logger.info(`${input.operation} ${res.ok ? 'ok' : 'fail'} (${res.durationMs}ms)`)
  return res
}
