import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { describeExecuteAll, describeRevertAll, executeChildren, executeSequential, revertChildren, revertSequential } from '../../core/compose.js'
import type { FanOut } from '../../core/compose.js'
import { collectErrors, toActionError } from '../../core/errors.js'
import type { ActionError } from '../../core/errors.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { StatefulAction, StatefulActionJsonSchema, restoreStateful } from '../../core/stateful.js'
import type { CommonSettings } from '../../settings.js'
import { CreateGroup } from '../base/create-group.js'
import { CreateUser } from '../base/create-user.js'

const Json = z.object({
  concurrency: z.enum(['sequential', 'concurrent']),
  createGroup: StatefulActionJsonSchema,
  createUsers: z.array(StatefulActionJsonSchema),
})

export type CreateUsersAndGroupInput = Pick<
  CommonSettings,
  'daemonUserCount' | 'buildGroupName' | 'buildGroupId' | 'buildUserPrefix' | 'buildUserIdBase' | 'buildUserConcurrency'
>

/**
 * Create the build group, then the build users in it.
 *
 * The users are independent of each other; whether they are created at once or one at a
 * time is a per-platform policy recorded with the action.
 */
export class CreateUsersAndGroup implements Action {
  readonly tag = 'create_users_and_group'

  private constructor(
    private readonly concurrency: FanOut,
    private readonly createGroup: StatefulAction<CreateGroup>,
    private readonly createUsers: StatefulAction<CreateUser>[],
  ) {}

  static async plan(input: CreateUsersAndGroupInput, probe: HostProbe = nodeProbe): Promise<StatefulAction<CreateUsersAndGroup>> {
    const createGroup = await CreateGroup.plan({ name: input.buildGroupName, gid: input.buildGroupId }, probe)
    const createUsers: StatefulAction<CreateUser>[] = []
    for (let idx = 1; idx <= input.daemonUserCount; idx++) {
      createUsers.push(await CreateUser.plan({
        name: `${input.buildUserPrefix}${idx}`,
        uid: input.buildUserIdBase + idx,
        groupName: input.buildGroupName,
        gid: input.buildGroupId,
        comment: `Nix build user ${idx}`,
      }, probe))
    }
    return StatefulAction.uncompleted(new CreateUsersAndGroup(input.buildUserConcurrency, createGroup, createUsers))
  }

  static fromJSON(raw: unknown): CreateUsersAndGroup {
    const json = Json.parse(raw)
    return new CreateUsersAndGroup(
      json.concurrency,
      restoreStateful(json.createGroup, 'create_group', CreateGroup.fromJSON),
      json.createUsers.map(u => restoreStateful(u, 'create_user', CreateUser.fromJSON)),
    )
  }

  children(): readonly StatefulAction[] {
    return [this.createGroup, ...this.createUsers]
  }

  tracingSynopsis(): string {
    return `Create build users (UID ${this.uidRange()}) and group (GID ${this.gid()})`
  }

  private uidRange(): string {
    const first = this.createUsers.at(0)?.action.uid
    const last = this.createUsers.at(-1)?.action.uid
    return first === undefined || last === undefined ? 'none' : `${first}-${last}`
  }

  private gid(): number {
    return this.createGroup.action.gid
  }

  tracingFields(): Record<string, unknown> {
    return { users: this.createUsers.length, gid: this.gid(), concurrency: this.concurrency }
  }

  executeDescription(): ActionDescription[] {
    const children = describeExecuteAll(this.children())
    if (children.length === 0) return []
    return [describe(this.tracingSynopsis(), children.map(d => d.description))]
  }

  revertDescription(): ActionDescription[] {
    const children = describeRevertAll(this.children())
    if (children.length === 0) return []
    return [describe(`Remove build users (UID ${this.uidRange()}) and group (GID ${this.gid()})`, children.map(d => d.description))]
  }

  async execute(ctx: ActionContext): Promise<void> {
    await executeSequential([this.createGroup], ctx)
    await executeChildren(this.concurrency, this.createUsers, ctx)
  }

  async revert(ctx: ActionContext): Promise<void> {
    // The group goes last and is attempted even when some users could not be removed.
    const errors: ActionError[] = []
    try {
      await revertChildren(this.concurrency, this.createUsers, ctx)
    } catch (e) {
      errors.push(toActionError(e))
    }
    try {
      await revertSequential([this.createGroup], ctx)
    } catch (e) {
      errors.push(toActionError(e))
    }
    const err = collectErrors(errors)
    if (err) throw err
  }

  toJSON(): Record<string, unknown> {
    return {
      concurrency: this.concurrency,
      createGroup: this.createGroup.toJSON(),
      createUsers: this.createUsers.map(u => u.toJSON()),
    }
  }
}
