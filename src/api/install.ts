import type { InstallPlan } from '../core/plan.js'
import { mkResult, recordFailure, runOperation } from '../core/runner.js'
import { DEFAULT_RECEIPT_PATH } from '../receipt/types.js'
import { loadReceiptIfExists, saveReceipt } from '../receipt/io.js'
import type { CommonOptions, Result } from '../types.js'

export interface InstallOptions extends CommonOptions {
  /**
   * Where the receipt is read from (to resume) and written to. Default: `/nix/receipt.json`.
   */
  receiptPath?: string
}

/**
 * Execute a plan, persisting the receipt after the attempt whether or not it succeeded.
 *
 * An existing receipt from the same planner and settings is resumed in place of `plan`;
 * one from a different planner or settings is refused before anything is touched.
 */
export async function install(plan: InstallPlan, opts?: InstallOptions): Promise<{ result: Result; plan: InstallPlan }> {
  const receiptPath = opts?.receiptPath ?? DEFAULT_RECEIPT_PATH

  let target = plan
  try {
    const existing = await loadReceiptIfExists(receiptPath)
    if (existing) {
      existing.checkCompatible(plan.planner)
      target = existing
    }
  } catch (e) {
    const result = mkResult('install', receiptPath)
    recordFailure(result, e)
    return { result, plan }
  }

  if (target.isComplete() && target !== plan) {
    const result = await runOperation({ operation: 'install', receiptPath, plan: target, opts })
    result.warnings.push(`Nix is already installed according to \`${receiptPath}\``)
    return { result, plan: target }
  }

  const result = await runOperation({
    operation: 'install',
    receiptPath,
    plan: target,
    opts,
    run: ctx => target.install(ctx),
    finalize: async (res) => {
      if (opts?.dryRun) return res
      try {
        await saveReceipt(receiptPath, target)
      } catch (e) {
        recordFailure(res, e)
      }
      return res
    },
  })
  return { result, plan: target }
}
