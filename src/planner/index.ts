import type { StatefulAction } from '../core/stateful.js'
import type { HostProbe } from '../core/fs.js'
import type { CommonSettings } from '../settings.js'
import type { Logger } from '../types.js'
import { LinuxPlanner } from './linux.js'

export interface PlanContext {
  logger: Logger
  probe: HostProbe
}

/**
 * Chooses and parameterizes the top-level actions for a kind of host.
 */
export interface Planner {
  readonly tag: PlannerTag
  plan(ctx: PlanContext): Promise<StatefulAction[]>
  settings(): CommonSettings
}

export const PLANNER_TAGS = ['linux'] as const
export type PlannerTag = (typeof PLANNER_TAGS)[number]

export function isPlannerTag(tag: string): tag is PlannerTag {
  return PLANNER_TAGS.some(t => t === tag)
}

export function createPlanner(tag: PlannerTag, settings: CommonSettings): Planner {
  switch (tag) {
    case 'linux': return new LinuxPlanner(settings)
  }
}

/**
 * The planner for the running host, or `undefined` when none applies.
 */
export function defaultPlannerTag(platform: NodeJS.Platform = process.platform): PlannerTag | undefined {
  return platform === 'linux' ? 'linux' : undefined
}
