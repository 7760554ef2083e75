import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describeExecuteAll, describeRevertAll, executeSequential, revertSequential } from '../../core/compose.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { StatefulAction, StatefulActionJsonSchema, restoreStateful } from '../../core/stateful.js'
import { underRoot } from '../../settings.js'
import type { CommonSettings } from '../../settings.js'
import { CreateDirectory } from '../base/create-directory.js'
import { CreateFile } from '../base/create-file.js'

export const NIX_CONF_FOLDER = '/etc/nix'
export const NIX_CONF = '/etc/nix/nix.conf'

const Json = z.object({
  createDirectory: StatefulActionJsonSchema,
  createFile: StatefulActionJsonSchema,
})

export function nixConf(buildGroupName: string, extraConf: readonly string[]): string {
  return [
    ...extraConf,
    '',
    `build-users-group = ${buildGroupName}`,
    '',
    'experimental-features = nix-command flakes',
    '',
    'auto-optimise-store = true',
    '',
  ].join('\n')
}

/**
 * Write `nix.conf`, which the daemon reads its settings from at startup.
 */
export class PlaceNixConfiguration implements Action {
  readonly tag = 'place_nix_configuration'

  private constructor(
    private readonly createDirectory: StatefulAction<CreateDirectory>,
    private readonly createFile: StatefulAction<CreateFile>,
  ) {}

  static async plan(
    settings: Pick<CommonSettings, 'root' | 'buildGroupName' | 'extraConf' | 'force'>,
    probe: HostProbe = nodeProbe,
  ): Promise<StatefulAction<PlaceNixConfiguration>> {
    const createDirectory = await CreateDirectory.plan({
      path: underRoot(settings.root, NIX_CONF_FOLDER),
      mode: 0o755,
      forcePruneOnRevert: settings.force,
    }, probe)
    const createFile = await CreateFile.plan({
      path: underRoot(settings.root, NIX_CONF),
      mode: 0o664,
      content: nixConf(settings.buildGroupName, settings.extraConf),
      force: settings.force,
    }, probe)
    return StatefulAction.uncompleted(new PlaceNixConfiguration(createDirectory, createFile))
  }

  static fromJSON(raw: unknown): PlaceNixConfiguration {
    const json = Json.parse(raw)
    return new PlaceNixConfiguration(
      restoreStateful(json.createDirectory, 'create_directory', CreateDirectory.fromJSON),
      restoreStateful(json.createFile, 'create_file', CreateFile.fromJSON),
    )
  }

  children(): readonly StatefulAction[] {
    return [this.createDirectory, this.createFile]
  }

  tracingSynopsis(): string {
    return `Place the Nix configuration in \`${NIX_CONF}\``
  }

  tracingFields(): Record<string, unknown> {
    return { path: this.createFile.action.path }
  }

  executeDescription(): ActionDescription[] {
    return describeExecuteAll(this.children())
  }

  revertDescription(): ActionDescription[] {
    return describeRevertAll(this.children())
  }

  async execute(ctx: ActionContext): Promise<void> {
    await executeSequential(this.children(), ctx)
  }

  async revert(ctx: ActionContext): Promise<void> {
    await revertSequential(this.children(), ctx)
  }

  toJSON(): Record<string, unknown> {
    return { createDirectory: this.createDirectory.toJSON(), createFile: this.createFile.toJSON() }
  }
}
