export type LeafErrorKind =
  | 'exists'
  | 'path_was_not_directory'
  | 'path_was_not_file'
  | 'path_user_mismatch'
  | 'path_group_mismatch'
  | 'user_uid_mismatch'
  | 'user_gid_mismatch'
  | 'group_gid_mismatch'
  | 'no_user'
  | 'no_group'
  | 'missing_command'
  | 'unsupported_url'
  | 'io'
  | 'command'
  | 'command_output'
  | 'fetch'
  | 'custom'

export type StructuralErrorKind = 'child' | 'children' | 'join' | 'cancelled' | 'failed_reverts'

export type ActionErrorKind = LeafErrorKind | StructuralErrorKind

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

export class ActionError extends Error {
  readonly kind: ActionErrorKind

  constructor(kind: ActionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ActionError'
    this.kind = kind
  }
}

/**
 * Filesystem failure with the operation and path that failed.
 */
export class IoError extends ActionError {
  constructor(readonly operation: string, readonly path: string, cause: unknown) {
    super('io', `${operation} \`${path}\`: ${messageOf(cause)}`, { cause })
    this.name = 'IoError'
  }
}

/**
 * An external command ran but did not exit successfully.
 */
export class CommandOutputError extends ActionError {
  constructor(
    readonly command: string,
    readonly status: number | null,
    readonly stdout: string,
    readonly stderr: string,
  ) {
    const maybeStatus = status === null ? '' : ` with status ${status}`
    super('command_output', `Failed to execute command${maybeStatus} \`${command}\`, stdout: ${stdout}\nstderr: ${stderr}\n`)
    this.name = 'CommandOutputError'
  }
}

/**
 * Wraps the error of exactly one child with the child's identity.
 */
export class ChildActionError extends ActionError {
  constructor(readonly childTag: string, readonly childSynopsis: string, readonly error: ActionError) {
    super('child', `Child action \`${childTag}\` (${childSynopsis}): ${error.message}`, { cause: error })
    this.name = 'ChildActionError'
  }
}

export class ChildrenActionError extends ActionError {
  constructor(readonly errors: ActionError[]) {
    super('children', `Multiple errors: ${errors.map(e => e.message).join(' & ')}`)
    this.name = 'ChildrenActionError'
  }
}

/**
 * A spawned task finished without producing a result.
 */
export class JoinError extends ActionError {
  constructor(cause: unknown) {
    super('join', `Joining spawned async task: ${messageOf(cause)}`, { cause })
    this.name = 'JoinError'
  }
}

export class CancelledError extends ActionError {
  constructor(reason?: string) {
    super('cancelled', reason ? `Cancelled: ${reason}` : 'Cancelled')
    this.name = 'CancelledError'
  }
}

/**
 * Execution failed and undoing the siblings that had succeeded failed too.
 * The host is left in a state that needs manual attention.
 */
export class FailedRevertsError extends ActionError {
  constructor(readonly executeError: ActionError, readonly revertErrors: ActionError[]) {
    super(
      'failed_reverts',
      `${executeError.message}; additionally, reverting completed siblings failed: ${revertErrors.map(e => e.message).join(' & ')}`,
      { cause: executeError },
    )
    this.name = 'FailedRevertsError'
  }
}

/**
 * Anything thrown from inside an action that is not already an `ActionError`.
 */
export function toActionError(e: unknown): ActionError {
  if (e instanceof ActionError) return e
  return new ActionError('custom', messageOf(e), { cause: e })
}

/**
 * Cancellation is reported as-is through composites; everything else gains the child's identity.
 */
export function wrapChildError(childTag: string, childSynopsis: string, e: ActionError): ActionError {
  if (e instanceof CancelledError) return e
  return new ChildActionError(childTag, childSynopsis, e)
}

/**
 * Zero, one or several errors as a single error (or nothing).
 */
export function collectErrors(errors: ActionError[]): ActionError | undefined {
  if (errors.length === 0) return undefined
  if (errors.length === 1) return errors[0]
  return new ChildrenActionError(errors)
}

/**
 * Every error reachable through child/aggregate wrapping, innermost last.
 */
export function flattenErrors(e: ActionError): ActionError[] {
  if (e instanceof ChildActionError) return [e, ...flattenErrors(e.error)]
  if (e instanceof ChildrenActionError) return [e, ...e.errors.flatMap(flattenErrors)]
  if (e instanceof FailedRevertsError) return [e, ...flattenErrors(e.executeError), ...e.revertErrors.flatMap(flattenErrors)]
  return [e]
}

export function isCancellation(e: ActionError): boolean {
  return flattenErrors(e).some(x => x instanceof CancelledError)
}

/**
 * Revert failures anywhere in the tree, for presenting separately from the execute error.
 */
export function revertFailuresOf(e: ActionError): ActionError[] {
  return flattenErrors(e)
    .filter((x): x is FailedRevertsError => x instanceof FailedRevertsError)
    .flatMap(x => x.revertErrors)
}
