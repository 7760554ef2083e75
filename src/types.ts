import type { ActionState } from './core/action.js'

export type Operation = 'plan' | 'install' | 'uninstall'

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  /**
   * A logger whose records carry `bindings` in addition to the parent's.
   * Actions use this to nest their records under the action that owns them.
   */
  child(bindings: LogFields): Logger
}

export interface ActionSummary {
  action: string
  synopsis: string
  state: ActionState
}

export interface Result {
  ok: boolean
  operation: Operation
  receiptPath?: string
  startedAt: string
  finishedAt: string
  durationMs: number
  /**
   * Top-level actions of the plan with the state they were left in.
   */
  actions: ActionSummary[]
  warnings: string[]
  errors: string[]
  /**
   * Failures hit while undoing changes. These need manual attention on the host.
   */
  revertErrors: string[]
  cancelled: boolean
  /**
   * Optional human-readable plan / summary text (best-effort).
   */
  planText?: string
}

export interface CommonOptions {
  /**
   * If provided, we append one JSON line per operation (Result summary).
   * Default: `${receiptPath}.log.jsonl`.
   */
  auditLogPath?: string
  logger?: Logger
  /**
   * If true, do not touch the host; only describe what would happen.
   */
  dryRun?: boolean
  /**
   * If true, return plan text in Result.planText.
   */
  includePlanText?: boolean
  /**
   * Include the explanation lines of each action in plan text.
   */
  explain?: boolean
  /**
   * Cooperative stop signal, observed between actions.
   */
  signal?: AbortSignal
}
