import type { InstallPlan, PlannerRecord } from '../core/plan.js'
import { mkResult, recordFailure, runOperation } from '../core/runner.js'
import { DEFAULT_RECEIPT_PATH } from '../receipt/types.js'
import { loadReceipt, removeReceipt, saveReceipt } from '../receipt/io.js'
import type { CommonOptions, Result } from '../types.js'

export interface UninstallOptions extends CommonOptions {
  /**
   * When given, the receipt must have been produced by this planner and settings.
   */
  expect?: PlannerRecord
}

/**
 * Revert everything a receipt records. The receipt is removed on success and rewritten on
 * failure so a later run can pick up what is left.
 */
export async function uninstall(receiptPath: string = DEFAULT_RECEIPT_PATH, opts?: UninstallOptions): Promise<{ result: Result; plan?: InstallPlan }> {
  let plan: InstallPlan
  try {
    plan = await loadReceipt(receiptPath)
    if (opts?.expect) plan.checkCompatible(opts.expect)
  } catch (e) {
    const result = mkResult('uninstall', receiptPath)
    recordFailure(result, e)
    return { result }
  }

  const result = await runOperation({
    operation: 'uninstall',
    receiptPath,
    plan,
    opts,
    run: ctx => plan.uninstall(ctx),
    finalize: async (res) => {
      if (opts?.dryRun) return res
      try {
        if (res.ok) await removeReceipt(receiptPath)
        else await saveReceipt(receiptPath, plan)
      } catch (e) {
        recordFailure(res, e)
      }
      return res
    },
  })
  return { result, plan }
}
