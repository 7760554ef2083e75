import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { executeCommand, which } from '../../core/command.js'
import { ActionError } from '../../core/errors.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { StatefulAction } from '../../core/stateful.js'

export const CreateUserParams = z.object({
  name: z.string().min(1),
  uid: z.number().int().nonnegative(),
  groupName: z.string().min(1),
  gid: z.number().int().nonnegative(),
  comment: z.string(),
})

export type CreateUserInput = z.input<typeof CreateUserParams>

const EXPLANATION = 'The Nix daemon requires system users it can act as in order to build'

/**
 * Create an operating system level user in the given group.
 */
export class CreateUser implements Action {
  readonly tag = 'create_user'

  private constructor(private readonly params: z.output<typeof CreateUserParams>) {}

  get uid(): number {
    return this.params.uid
  }

  static async plan(input: CreateUserInput, probe: HostProbe = nodeProbe): Promise<StatefulAction<CreateUser>> {
    const params = CreateUserParams.parse(input)
    const action = new CreateUser(params)

    if (!(await probe.commandExists('useradd') || await probe.commandExists('adduser'))) {
      throw new ActionError('missing_command', 'Could not find a supported command to create users in PATH; please install `useradd` or `adduser`')
    }
    if (!(await probe.commandExists('userdel') || await probe.commandExists('deluser'))) {
      throw new ActionError('missing_command', 'Could not find a supported command to delete users in PATH; please install `userdel` or `deluser`')
    }

    const existing = await probe.lookupUser(params.name)
    if (!existing) return StatefulAction.uncompleted(action)
    if (existing.uid !== params.uid) {
      throw new ActionError(
        'user_uid_mismatch',
        `User \`${params.name}\` existed but had a different uid (${existing.uid}) than planned (${params.uid})`,
      )
    }
    if (existing.gid !== params.gid) {
      throw new ActionError(
        'user_gid_mismatch',
        `User \`${params.name}\` existed but had a different gid (${existing.gid}) than planned (${params.gid})`,
      )
    }
    return StatefulAction.skipped(action)
  }

  static fromJSON(raw: unknown): CreateUser {
    return new CreateUser(CreateUserParams.parse(raw))
  }

  tracingSynopsis(): string {
    const { name, uid, groupName, gid } = this.params
    return `Create user \`${name}\` (UID ${uid}) in group \`${groupName}\` (GID ${gid})`
  }

  tracingFields(): Record<string, unknown> {
    const { name, uid, groupName, gid } = this.params
    return { user: name, uid, groupName, gid }
  }

  executeDescription(): ActionDescription[] {
    return [describe(this.tracingSynopsis(), [EXPLANATION])]
  }

  revertDescription(): ActionDescription[] {
    const { name, uid, groupName, gid } = this.params
    return [describe(`Delete user \`${name}\` (UID ${uid}) in group \`${groupName}\` (GID ${gid})`, [EXPLANATION])]
  }

  async execute(ctx: ActionContext): Promise<void> {
    const { name, uid, groupName, gid, comment } = this.params
    if (await which('useradd')) {
      await executeCommand('useradd', [
        '--home-dir', '/var/empty',
        '--comment', comment,
        '--gid', String(gid),
        '--groups', String(gid),
        '--no-user-group',
        '--system',
        '--shell', '/sbin/nologin',
        '--uid', String(uid),
        '--password', '!',
        name,
      ], { logger: ctx.logger })
    } else if (await which('adduser')) {
      await executeCommand('adduser', [
        '--home', '/var/empty',
        '-H',
        '--gecos', comment,
        '--ingroup', groupName,
        '--system',
        '--shell', '/sbin/nologin',
        '--uid', String(uid),
        '--disabled-password',
        name,
      ], { logger: ctx.logger })
    } else {
      throw new ActionError('missing_command', 'Could not find `useradd` or `adduser` in PATH')
    }
  }

  async revert(ctx: ActionContext): Promise<void> {
    const { name } = this.params
    if (await which('userdel')) {
      await executeCommand('userdel', [name], { logger: ctx.logger })
    } else if (await which('deluser')) {
      await executeCommand('deluser', [name], { logger: ctx.logger })
    } else {
      throw new ActionError('missing_command', 'Could not find `userdel` or `deluser` in PATH')
    }
  }

  toJSON(): Record<string, unknown> {
    return { ...this.params }
  }
}
