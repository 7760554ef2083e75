import fs from 'fs-extra'
import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { ActionError } from '../../core/errors.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { createDir, isEmptyDir, removeDir, removePath } from '../../core/fs-ops.js'
import { StatefulAction } from '../../core/stateful.js'

export const CreateDirectoryParams = z.object({
  path: z.string().min(1),
  user: z.string().optional(),
  group: z.string().optional(),
  mode: z.number().int().nonnegative().optional(),
  forcePruneOnRevert: z.boolean().default(false),
})

export type CreateDirectoryInput = z.input<typeof CreateDirectoryParams>

/**
 * Create a directory, optionally with an owning user, group and mode.
 *
 * Revert only removes the directory if it is empty, unless `forcePruneOnRevert` is set.
 */
export class CreateDirectory implements Action {
  readonly tag = 'create_directory'

  private constructor(private readonly params: z.output<typeof CreateDirectoryParams>) {}

  get path(): string {
    return this.params.path
  }

  static async plan(input: CreateDirectoryInput, probe: HostProbe = nodeProbe): Promise<StatefulAction<CreateDirectory>> {
    const params = CreateDirectoryParams.parse(input)
    const action = new CreateDirectory(params)
    if (!await probe.pathExists(params.path)) return StatefulAction.uncompleted(action)

    const st = await probe.stat(params.path)
    if (!st.isDirectory()) {
      throw new ActionError('path_was_not_directory', `Path \`${params.path}\` exists but is not a directory`)
    }
    if (params.user !== undefined) {
      const user = await probe.lookupUser(params.user)
      if (!user) throw new ActionError('no_user', `Getting user \`${params.user}\``)
      if (user.uid !== st.uid) {
        throw new ActionError(
          'path_user_mismatch',
          `\`${params.path}\` exists with a different uid (${st.uid}) than planned (${user.uid}), consider updating it with \`chown ${user.uid} ${params.path}\``,
        )
      }
    }
    if (params.group !== undefined) {
      const group = await probe.lookupGroup(params.group)
      if (!group) throw new ActionError('no_group', `Getting group \`${params.group}\``)
      if (group.gid !== st.gid) {
        throw new ActionError(
          'path_group_mismatch',
          `\`${params.path}\` exists with a different gid (${st.gid}) than planned (${group.gid}), consider updating it with \`chgrp ${group.gid} ${params.path}\``,
        )
      }
    }
    return StatefulAction.skipped(action)
  }

  static fromJSON(raw: unknown): CreateDirectory {
    return new CreateDirectory(CreateDirectoryParams.parse(raw))
  }

  tracingSynopsis(): string {
    return `Create directory \`${this.params.path}\``
  }

  tracingFields(): Record<string, unknown> {
    const { path, user, group, mode } = this.params
    return { path, user, group, mode: mode === undefined ? undefined : `0o${mode.toString(8)}` }
  }

  executeDescription(): ActionDescription[] {
    return [describe(this.tracingSynopsis())]
  }

  revertDescription(): ActionDescription[] {
    const suffix = this.params.forcePruneOnRevert ? '' : ' if no other contents exist'
    return [describe(`Remove the directory \`${this.params.path}\`${suffix}`)]
  }

  async execute(_ctx: ActionContext): Promise<void> {
    const { path, user, group, mode } = this.params
    await createDir(path, { user, group, mode })
  }

  async revert(ctx: ActionContext): Promise<void> {
    const { path, forcePruneOnRevert } = this.params
    if (!await fs.pathExists(path)) {
      ctx.logger.debug(`\`${path}\` is already gone`)
      return
    }
    if (forcePruneOnRevert) {
      await removePath(path)
      return
    }
    if (await isEmptyDir(path)) {
      await removeDir(path)
      return
    }
    ctx.logger.warn(`Not removing \`${path}\`: it is not empty`)
  }

  toJSON(): Record<string, unknown> {
    return { ...this.params }
  }
}
