import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describeExecuteAll, describeRevertAll, executeSequential, revertSequential } from '../../core/compose.js'
import { wrapChildError } from '../../core/errors.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { StatefulAction, StatefulActionJsonSchema, restoreStateful } from '../../core/stateful.js'
import { spawnTask } from '../../core/task.js'
import { underRoot } from '../../settings.js'
import type { CommonSettings } from '../../settings.js'
import { FetchAndUnpackNix } from '../base/fetch-and-unpack-nix.js'
import { MoveUnpackedNix } from '../base/move-unpacked-nix.js'
import { CreateNixTree } from './create-nix-tree.js'
import { CreateUsersAndGroup } from './create-users-and-group.js'

export const SCRATCH_DIR = '/nix/temp-install-dir'

const Json = z.object({
  fetchNix: StatefulActionJsonSchema,
  createUsersAndGroup: StatefulActionJsonSchema,
  createNixTree: StatefulActionJsonSchema,
  moveUnpackedNix: StatefulActionJsonSchema,
})

/**
 * Place Nix and its requirements onto the host: the download overlaps with creating the
 * build users and the `/nix` tree, and the unpacked store is moved in once all three are done.
 */
export class ProvisionNix implements Action {
  readonly tag = 'provision_nix'

  private constructor(
    private readonly fetchNix: StatefulAction<FetchAndUnpackNix>,
    private readonly createUsersAndGroup: StatefulAction<CreateUsersAndGroup>,
    private readonly createNixTree: StatefulAction<CreateNixTree>,
    private readonly moveUnpackedNix: StatefulAction<MoveUnpackedNix>,
  ) {}

  static async plan(settings: CommonSettings, probe: HostProbe = nodeProbe): Promise<StatefulAction<ProvisionNix>> {
    const scratch = underRoot(settings.root, SCRATCH_DIR)
    const fetchNix = await FetchAndUnpackNix.plan({
      url: settings.packageUrl,
      dest: scratch,
      sslCertFile: settings.sslCertFile,
    })
    const createUsersAndGroup = await CreateUsersAndGroup.plan(settings, probe)
    const createNixTree = await CreateNixTree.plan({ root: settings.root }, probe)
    const moveUnpackedNix = await MoveUnpackedNix.plan({ src: scratch, dest: underRoot(settings.root, '/nix') })
    return StatefulAction.uncompleted(new ProvisionNix(fetchNix, createUsersAndGroup, createNixTree, moveUnpackedNix))
  }

  static fromJSON(raw: unknown): ProvisionNix {
    const json = Json.parse(raw)
    return new ProvisionNix(
      restoreStateful(json.fetchNix, 'fetch_and_unpack_nix', FetchAndUnpackNix.fromJSON),
      restoreStateful(json.createUsersAndGroup, 'create_users_and_group', CreateUsersAndGroup.fromJSON),
      restoreStateful(json.createNixTree, 'create_nix_tree', CreateNixTree.fromJSON),
      restoreStateful(json.moveUnpackedNix, 'move_unpacked_nix', MoveUnpackedNix.fromJSON),
    )
  }

  children(): readonly StatefulAction[] {
    return [this.fetchNix, this.createUsersAndGroup, this.createNixTree, this.moveUnpackedNix]
  }

  tracingSynopsis(): string {
    return 'Provision Nix'
  }

  tracingFields(): Record<string, unknown> {
    return {}
  }

  executeDescription(): ActionDescription[] {
    return describeExecuteAll(this.children())
  }

  revertDescription(): ActionDescription[] {
    return describeRevertAll(this.children())
  }

  async execute(ctx: ActionContext): Promise<void> {
    const fetch = spawnTask(ctx, taskCtx => this.fetchNix.tryExecute(taskCtx))
    try {
      await executeSequential([this.createUsersAndGroup, this.createNixTree], ctx)
    } catch (e) {
      fetch.abort('a sibling of the download failed')
      // Only waits for the download to observe the abort.
      await fetch.outcome
      throw e
    }
    const outcome = await fetch.outcome
    if (!outcome.ok) {
      throw wrapChildError(this.fetchNix.action.tag, this.fetchNix.action.tracingSynopsis(), outcome.error)
    }
    await executeSequential([this.moveUnpackedNix], ctx)
  }

  async revert(ctx: ActionContext): Promise<void> {
    await revertSequential(this.children(), ctx)
  }

  toJSON(): Record<string, unknown> {
    return {
      fetchNix: this.fetchNix.toJSON(),
      createUsersAndGroup: this.createUsersAndGroup.toJSON(),
      createNixTree: this.createNixTree.toJSON(),
      moveUnpackedNix: this.moveUnpackedNix.toJSON(),
    }
  }
}
