import path from 'path'
import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { ActionError } from '../../core/errors.js'
import { readDir, removePath, renamePath } from '../../core/fs-ops.js'
import { StatefulAction } from '../../core/stateful.js'

export const MoveUnpackedNixParams = z.object({
  src: z.string().min(1),
  dest: z.string().min(1),
})

export type MoveUnpackedNixInput = z.input<typeof MoveUnpackedNixParams>

/**
 * Move the store of an unpacked Nix tarball at `src` into `<dest>/store`.
 */
export class MoveUnpackedNix implements Action {
  readonly tag = 'move_unpacked_nix'

  private constructor(private readonly params: z.output<typeof MoveUnpackedNixParams>) {}

  static async plan(input: MoveUnpackedNixInput): Promise<StatefulAction<MoveUnpackedNix>> {
    return StatefulAction.uncompleted(new MoveUnpackedNix(MoveUnpackedNixParams.parse(input)))
  }

  static fromJSON(raw: unknown): MoveUnpackedNix {
    return new MoveUnpackedNix(MoveUnpackedNixParams.parse(raw))
  }

  tracingSynopsis(): string {
    return `Move the downloaded Nix into \`${this.params.dest}\``
  }

  tracingFields(): Record<string, unknown> {
    return { src: this.params.src, dest: this.params.dest }
  }

  executeDescription(): ActionDescription[] {
    return [describe(this.tracingSynopsis(), [
      `Nix is being downloaded to \`${this.params.src}\` and should be in \`${this.params.dest}\``,
    ])]
  }

  revertDescription(): ActionDescription[] {
    return []
  }

  async execute(ctx: ActionContext): Promise<void> {
    const { src, dest } = this.params
    const entries = await readDir(src)
    const found = entries.filter(e => e.startsWith('nix-'))
    if (found.length !== 1) {
      throw new ActionError('custom', `Expected exactly one \`nix-*\` directory in \`${src}\`, found ${found.length}`)
    }
    const srcStore = path.join(src, found[0], 'store')
    const destStore = path.join(dest, 'store')
    ctx.logger.debug('Renaming', { src: srcStore, dest: destStore })
    await renamePath(srcStore, destStore)
    await removePath(src)
  }

  // The store goes away with the tree it was moved into.
  async revert(_ctx: ActionContext): Promise<void> {}

  toJSON(): Record<string, unknown> {
    return { ...this.params }
  }
}
