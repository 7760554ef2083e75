import { nodeProbe } from '../core/fs.js'
import type { HostProbe } from '../core/fs.js'
import { noopLogger } from '../core/log.js'
import { InstallPlan, PlanError } from '../core/plan.js'
import { mkResult, recordFailure, runOperation } from '../core/runner.js'
import { createPlanner, defaultPlannerTag } from '../planner/index.js'
import type { PlannerTag } from '../planner/index.js'
import type { CommonSettings } from '../settings.js'
import type { CommonOptions, Result } from '../types.js'

export interface PlanOptions extends CommonOptions {
  /**
   * Default: the planner for the running host.
   */
  planner?: PlannerTag
  /**
   * Read-only view of the host used while planning. Default: the real host.
   */
  probe?: HostProbe
}

/**
 * Probe the host and build a plan. Never mutates the host.
 */
export async function plan(settings: CommonSettings, opts?: PlanOptions): Promise<{ result: Result; plan?: InstallPlan }> {
  const tag = opts?.planner ?? defaultPlannerTag()
  if (!tag) {
    const result = mkResult('plan')
    recordFailure(result, new PlanError('action', `No planner supports this host (${process.platform})`))
    return { result }
  }

  let built: InstallPlan
  try {
    built = await InstallPlan.plan(createPlanner(tag, settings), {
      logger: opts?.logger ?? noopLogger(),
      probe: opts?.probe ?? nodeProbe,
    })
  } catch (e) {
    const result = mkResult('plan')
    recordFailure(result, e)
    return { result }
  }

  const result = await runOperation({ operation: 'plan', plan: built, opts })
  return { result, plan: built }
}
