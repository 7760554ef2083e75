export type { Result, ActionSummary, Logger, LogFields, CommonOptions, Operation } from './types.js'
export type { Action, ActionContext, ActionDescription, ActionState } from './core/action.js'
export type { FanOut } from './core/compose.js'
export type { HostProbe, UserEntry, GroupEntry } from './core/fs.js'
export type { PlannerRecord, PlanErrorKind } from './core/plan.js'
export type { ActionErrorKind } from './core/errors.js'
export type { Planner, PlanContext, PlannerTag } from './planner/index.js'
export type { CommonSettings, CommonSettingsInput } from './settings.js'
export type { AnyAction, ActionTag } from './actions/registry.js'
export type { ReceiptJson } from './receipt/types.js'

export { StatefulAction, deriveState } from './core/stateful.js'
export { executeChildren, revertChildren, executeSequential, revertSequential, executeConcurrent, revertConcurrent } from './core/compose.js'
export { spawnTask, joinAll } from './core/task.js'
export { interruptSignal, linkedController, neverCancelled } from './core/cancel.js'
export {
  ActionError,
  CancelledError,
  ChildActionError,
  ChildrenActionError,
  CommandOutputError,
  FailedRevertsError,
  IoError,
  JoinError,
} from './core/errors.js'
export { InstallPlan, PlanError } from './core/plan.js'
export { noopLogger, createPinoLogger } from './core/log.js'
export { nodeProbe } from './core/fs.js'
export { decodeStatefulAction } from './actions/registry.js'
export { createPlanner, defaultPlannerTag } from './planner/index.js'
export { resolveSettings, parseSettings, defaultBuildUserConcurrency } from './settings.js'
export { loadReceipt, saveReceipt, removeReceipt } from './receipt/io.js'
export { DEFAULT_RECEIPT_PATH, RECEIPT_VERSION } from './receipt/types.js'

export { plan, install, uninstall } from './api/index.js'
