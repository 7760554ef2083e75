import fs from 'fs-extra'
import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { ActionError } from '../../core/errors.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { removePath, writeFileAtomic } from '../../core/fs-ops.js'
import { StatefulAction } from '../../core/stateful.js'

export const CreateFileParams = z.object({
  path: z.string().min(1),
  user: z.string().optional(),
  group: z.string().optional(),
  mode: z.number().int().nonnegative().optional(),
  content: z.string(),
  force: z.boolean().default(false),
})

export type CreateFileInput = z.input<typeof CreateFileParams>

/**
 * Create a file with the given content. An existing file with different content is only
 * replaced when `force` is set.
 */
export class CreateFile implements Action {
  readonly tag = 'create_file'

  private constructor(private readonly params: z.output<typeof CreateFileParams>) {}

  get path(): string {
    return this.params.path
  }

  static async plan(input: CreateFileInput, probe: HostProbe = nodeProbe): Promise<StatefulAction<CreateFile>> {
    const params = CreateFileParams.parse(input)
    const action = new CreateFile(params)
    if (!await probe.pathExists(params.path)) return StatefulAction.uncompleted(action)

    const st = await probe.stat(params.path)
    if (!st.isFile()) {
      throw new ActionError('path_was_not_file', `\`${params.path}\` was not a file`)
    }
    const existing = await probe.readFile(params.path)
    if (existing === params.content) return StatefulAction.skipped(action)
    if (!params.force) {
      throw new ActionError(
        'exists',
        `\`${params.path}\` exists with different content than planned, consider removing it with \`rm ${params.path}\``,
      )
    }
    return StatefulAction.uncompleted(action)
  }

  static fromJSON(raw: unknown): CreateFile {
    return new CreateFile(CreateFileParams.parse(raw))
  }

  tracingSynopsis(): string {
    return `Create or overwrite file \`${this.params.path}\``
  }

  tracingFields(): Record<string, unknown> {
    const { path, user, group, mode } = this.params
    return { path, user, group, mode: mode === undefined ? undefined : `0o${mode.toString(8)}` }
  }

  executeDescription(): ActionDescription[] {
    return [describe(this.tracingSynopsis())]
  }

  revertDescription(): ActionDescription[] {
    return [describe(`Delete file \`${this.params.path}\``)]
  }

  async execute(_ctx: ActionContext): Promise<void> {
    const { path, user, group, mode, content } = this.params
    await writeFileAtomic(path, content, { user, group, mode })
  }

  async revert(ctx: ActionContext): Promise<void> {
    if (!await fs.pathExists(this.params.path)) {
      ctx.logger.debug(`\`${this.params.path}\` is already gone`)
      return
    }
    await removePath(this.params.path)
  }

  toJSON(): Record<string, unknown> {
    return { ...this.params }
  }
}
