import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { executeCommand, which } from '../../core/command.js'
import { ActionError } from '../../core/errors.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { StatefulAction } from '../../core/stateful.js'

export const CreateGroupParams = z.object({
  name: z.string().min(1),
  gid: z.number().int().nonnegative(),
})

export type CreateGroupInput = z.input<typeof CreateGroupParams>

export class CreateGroup implements Action {
  readonly tag = 'create_group'

  private constructor(private readonly params: z.output<typeof CreateGroupParams>) {}

  get name(): string {
    return this.params.name
  }

  get gid(): number {
    return this.params.gid
  }

  static async plan(input: CreateGroupInput, probe: HostProbe = nodeProbe): Promise<StatefulAction<CreateGroup>> {
    const params = CreateGroupParams.parse(input)
    const action = new CreateGroup(params)

    if (!(await probe.commandExists('groupadd') || await probe.commandExists('addgroup'))) {
      throw new ActionError('missing_command', 'Could not find a supported command to create groups in PATH; please install `groupadd` or `addgroup`')
    }
    if (!(await probe.commandExists('groupdel') || await probe.commandExists('delgroup'))) {
      throw new ActionError('missing_command', 'Could not find a supported command to delete groups in PATH; please install `groupdel` or `delgroup`')
    }

    const existing = await probe.lookupGroup(params.name)
    if (!existing) return StatefulAction.uncompleted(action)
    if (existing.gid !== params.gid) {
      throw new ActionError(
        'group_gid_mismatch',
        `Group \`${params.name}\` existed but had a different gid (${existing.gid}) than planned (${params.gid})`,
      )
    }
    return StatefulAction.skipped(action)
  }

  static fromJSON(raw: unknown): CreateGroup {
    return new CreateGroup(CreateGroupParams.parse(raw))
  }

  tracingSynopsis(): string {
    return `Create group \`${this.params.name}\` (GID ${this.params.gid})`
  }

  tracingFields(): Record<string, unknown> {
    return { group: this.params.name, gid: this.params.gid }
  }

  executeDescription(): ActionDescription[] {
    return [describe(this.tracingSynopsis(), [
      'The Nix daemon requires a system user group its system users can be part of',
    ])]
  }

  revertDescription(): ActionDescription[] {
    return [describe(`Delete group \`${this.params.name}\` (GID ${this.params.gid})`, [
      'The Nix daemon requires a system user group its system users can be part of',
    ])]
  }

  async execute(ctx: ActionContext): Promise<void> {
    const { name, gid } = this.params
    if (await which('groupadd')) {
      await executeCommand('groupadd', ['-g', String(gid), '--system', name], { logger: ctx.logger })
    } else if (await which('addgroup')) {
      await executeCommand('addgroup', ['-g', String(gid), '--system', name], { logger: ctx.logger })
    } else {
      throw new ActionError('missing_command', 'Could not find `groupadd` or `addgroup` in PATH')
    }
  }

  async revert(ctx: ActionContext): Promise<void> {
    const { name } = this.params
    if (await which('groupdel')) {
      await executeCommand('groupdel', [name], { logger: ctx.logger })
    } else if (await which('delgroup')) {
      await executeCommand('delgroup', [name], { logger: ctx.logger })
    } else {
      throw new ActionError('missing_command', 'Could not find `groupdel` or `delgroup` in PATH')
    }
  }

  toJSON(): Record<string, unknown> {
    return { ...this.params }
  }
}
