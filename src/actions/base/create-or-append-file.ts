import fs from 'fs-extra'
import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { ActionError } from '../../core/errors.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { appendText, applyOwnership, readText, removePath, writeFileAtomic } from '../../core/fs-ops.js'
import { StatefulAction } from '../../core/stateful.js'

export const CreateOrAppendFileParams = z.object({
  path: z.string().min(1),
  user: z.string().optional(),
  group: z.string().optional(),
  mode: z.number().int().nonnegative().optional(),
  content: z.string().min(1),
})

export type CreateOrAppendFileInput = z.input<typeof CreateOrAppendFileParams>

/**
 * Append a block of text to a file, creating the file if needed.
 *
 * Revert cuts exactly that block back out, and deletes the file if nothing else is left.
 */
export class CreateOrAppendFile implements Action {
  readonly tag = 'create_or_append_file'

  private constructor(private readonly params: z.output<typeof CreateOrAppendFileParams>) {}

  get path(): string {
    return this.params.path
  }

  static async plan(input: CreateOrAppendFileInput, probe: HostProbe = nodeProbe): Promise<StatefulAction<CreateOrAppendFile>> {
    const params = CreateOrAppendFileParams.parse(input)
    const action = new CreateOrAppendFile(params)
    if (!await probe.pathExists(params.path)) return StatefulAction.uncompleted(action)

    const st = await probe.stat(params.path)
    if (!st.isFile()) {
      throw new ActionError('path_was_not_file', `\`${params.path}\` was not a file`)
    }
    const existing = await probe.readFile(params.path)
    if (existing.includes(params.content)) return StatefulAction.skipped(action)
    return StatefulAction.uncompleted(action)
  }

  static fromJSON(raw: unknown): CreateOrAppendFile {
    return new CreateOrAppendFile(CreateOrAppendFileParams.parse(raw))
  }

  tracingSynopsis(): string {
    return `Create or append file \`${this.params.path}\``
  }

  tracingFields(): Record<string, unknown> {
    const { path, user, group, mode } = this.params
    return { path, user, group, mode: mode === undefined ? undefined : `0o${mode.toString(8)}` }
  }

  executeDescription(): ActionDescription[] {
    return [describe(this.tracingSynopsis())]
  }

  revertDescription(): ActionDescription[] {
    return [describe(`Delete Nix related fragment from file \`${this.params.path}\``, [
      'The fragment is removed; the file is deleted if it is left empty',
    ])]
  }

  async execute(_ctx: ActionContext): Promise<void> {
    const { path, user, group, mode, content } = this.params
    const existed = await fs.pathExists(path)
    await appendText(path, content)
    if (!existed) await applyOwnership(path, { user, group, mode })
  }

  async revert(ctx: ActionContext): Promise<void> {
    const { path, content } = this.params
    if (!await fs.pathExists(path)) {
      ctx.logger.debug(`\`${path}\` is already gone`)
      return
    }
    const current = await readText(path)
    const idx = current.lastIndexOf(content)
    if (idx < 0) {
      ctx.logger.warn(`\`${path}\` no longer contains the appended fragment; leaving it as is`)
      return
    }
    const remaining = current.slice(0, idx) + current.slice(idx + content.length)
    if (remaining.trim().length === 0) {
      await removePath(path)
      return
    }
    const st = await fs.stat(path)
    await writeFileAtomic(path, remaining, { mode: st.mode & 0o7777 })
  }

  toJSON(): Record<string, unknown> {
    return { ...this.params }
  }
}
