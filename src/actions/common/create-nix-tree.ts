import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { describeExecuteAll, describeRevertAll, executeSequential, revertSequential } from '../../core/compose.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { StatefulAction, StatefulActionJsonSchema, restoreStateful } from '../../core/stateful.js'
import { underRoot } from '../../settings.js'
import { CreateDirectory } from '../base/create-directory.js'

export const NIX_TREE_PATHS = [
  '/nix',
  '/nix/var',
  '/nix/var/log',
  '/nix/var/log/nix',
  '/nix/var/log/nix/drvs',
  '/nix/var/nix',
  '/nix/var/nix/db',
  '/nix/var/nix/gcroots',
  '/nix/var/nix/gcroots/per-user',
  '/nix/var/nix/profiles',
  '/nix/var/nix/profiles/per-user',
  '/nix/var/nix/temproots',
  '/nix/var/nix/userpool',
  '/nix/var/nix/daemon-socket',
] as const

const Json = z.object({
  createDirectories: z.array(StatefulActionJsonSchema),
})

export interface CreateNixTreeInput {
  root: string
}

/**
 * Create the `/nix` directory tree, parents first.
 */
export class CreateNixTree implements Action {
  readonly tag = 'create_nix_tree'

  private constructor(private readonly createDirectories: StatefulAction<CreateDirectory>[]) {}

  static async plan(input: CreateNixTreeInput, probe: HostProbe = nodeProbe): Promise<StatefulAction<CreateNixTree>> {
    const createDirectories: StatefulAction<CreateDirectory>[] = []
    for (const p of NIX_TREE_PATHS) {
      createDirectories.push(await CreateDirectory.plan({
        path: underRoot(input.root, p),
        mode: 0o755,
        // The store moved in later is not ours to keep once `/nix` goes.
        forcePruneOnRevert: p === '/nix',
      }, probe))
    }
    return StatefulAction.uncompleted(new CreateNixTree(createDirectories))
  }

  static fromJSON(raw: unknown): CreateNixTree {
    const json = Json.parse(raw)
    return new CreateNixTree(json.createDirectories.map(c => restoreStateful(c, 'create_directory', CreateDirectory.fromJSON)))
  }

  children(): readonly StatefulAction[] {
    return this.createDirectories
  }

  tracingSynopsis(): string {
    return 'Create a directory tree in `/nix`'
  }

  tracingFields(): Record<string, unknown> {
    return {}
  }

  executeDescription(): ActionDescription[] {
    const children = describeExecuteAll(this.createDirectories)
    if (children.length === 0) return []
    return [describe(this.tracingSynopsis(), [
      'Nix and the Nix daemon require a Nix Store, which will be stored at `/nix`',
      ...children.map(d => d.description),
    ])]
  }

  revertDescription(): ActionDescription[] {
    const children = describeRevertAll(this.createDirectories)
    if (children.length === 0) return []
    return [describe('Remove the directory tree in `/nix`', children.map(d => d.description))]
  }

  async execute(ctx: ActionContext): Promise<void> {
    await executeSequential(this.createDirectories, ctx)
  }

  async revert(ctx: ActionContext): Promise<void> {
    await revertSequential(this.createDirectories, ctx)
  }

  toJSON(): Record<string, unknown> {
    return { createDirectories: this.createDirectories.map(c => c.toJSON()) }
  }
}
