import path from 'path'
import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { describeExecuteAll, describeRevertAll, executeConcurrent, executeSequential, revertConcurrent, revertSequential } from '../../core/compose.js'
import { collectErrors, toActionError } from '../../core/errors.js'
import type { ActionError } from '../../core/errors.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { StatefulAction, StatefulActionJsonSchema, restoreStateful } from '../../core/stateful.js'
import { underRoot } from '../../settings.js'
import { CreateDirectory } from '../base/create-directory.js'
import { CreateOrAppendFile } from '../base/create-or-append-file.js'

export const PROFILE_TARGETS = [
  '/etc/bashrc',
  '/etc/profile.d/nix.sh',
  '/etc/zshenv',
  '/etc/bash.bashrc',
  '/etc/zsh/zshenv',
] as const

// Common values of `$__fish_sysconf_dir`.
export const PROFILE_FISH_PREFIXES = [
  '/etc/fish',
  '/usr/local/etc/fish',
  '/opt/homebrew/etc/fish',
  '/opt/local/etc/fish',
] as const

const PROFILE_FISH_SUFFIX = 'conf.d/nix.fish'
const PROFILE_NIX_FILE_SHELL = '/nix/var/nix/profiles/default/etc/profile.d/nix-daemon.sh'
const PROFILE_NIX_FILE_FISH = '/nix/var/nix/profiles/default/etc/profile.d/nix-daemon.fish'

export const SHELL_SNIPPET = [
  '',
  '# Nix',
  `if [ -e '${PROFILE_NIX_FILE_SHELL}' ]; then`,
  `    . '${PROFILE_NIX_FILE_SHELL}'`,
  'fi',
  '# End Nix',
  '',
].join('\n')

export const FISH_SNIPPET = [
  '',
  '# Nix',
  `if test -e '${PROFILE_NIX_FILE_FISH}'`,
  `    . '${PROFILE_NIX_FILE_FISH}'`,
  'end',
  '# End Nix',
  '',
].join('\n')

const Json = z.object({
  createDirectories: z.array(StatefulActionJsonSchema),
  createOrAppendFiles: z.array(StatefulActionJsonSchema),
})

/**
 * Hook Nix into every shell startup file whose directory exists on the host.
 * Each file is separate, so they are edited at once.
 */
export class ConfigureShellProfile implements Action {
  readonly tag = 'configure_shell_profile'

  private constructor(
    private readonly createDirectories: StatefulAction<CreateDirectory>[],
    private readonly createOrAppendFiles: StatefulAction<CreateOrAppendFile>[],
  ) {}

  static async plan(input: { root: string }, probe: HostProbe = nodeProbe): Promise<StatefulAction<ConfigureShellProfile>> {
    const createDirectories: StatefulAction<CreateDirectory>[] = []
    const createOrAppendFiles: StatefulAction<CreateOrAppendFile>[] = []

    for (const target of PROFILE_TARGETS) {
      const file = underRoot(input.root, target)
      if (!await probe.pathExists(path.dirname(file))) continue
      createOrAppendFiles.push(await CreateOrAppendFile.plan({ path: file, mode: 0o644, content: SHELL_SNIPPET }, probe))
    }

    for (const prefix of PROFILE_FISH_PREFIXES) {
      const prefixPath = underRoot(input.root, prefix)
      if (!await probe.pathExists(prefixPath)) continue
      const file = path.join(prefixPath, PROFILE_FISH_SUFFIX)
      createDirectories.push(await CreateDirectory.plan({ path: path.dirname(file), mode: 0o755 }, probe))
      createOrAppendFiles.push(await CreateOrAppendFile.plan({ path: file, mode: 0o644, content: FISH_SNIPPET }, probe))
    }

    return StatefulAction.uncompleted(new ConfigureShellProfile(createDirectories, createOrAppendFiles))
  }

  static fromJSON(raw: unknown): ConfigureShellProfile {
    const json = Json.parse(raw)
    return new ConfigureShellProfile(
      json.createDirectories.map(d => restoreStateful(d, 'create_directory', CreateDirectory.fromJSON)),
      json.createOrAppendFiles.map(f => restoreStateful(f, 'create_or_append_file', CreateOrAppendFile.fromJSON)),
    )
  }

  children(): readonly StatefulAction[] {
    return [...this.createDirectories, ...this.createOrAppendFiles]
  }

  tracingSynopsis(): string {
    return 'Configure the shell profiles'
  }

  tracingFields(): Record<string, unknown> {
    return { files: this.createOrAppendFiles.map(f => f.action.path) }
  }

  executeDescription(): ActionDescription[] {
    const children = describeExecuteAll(this.children())
    if (children.length === 0) return []
    return [describe(this.tracingSynopsis(), [
      'Update the shell profiles to import Nix',
      ...children.map(d => d.description),
    ])]
  }

  revertDescription(): ActionDescription[] {
    const children = describeRevertAll(this.children())
    if (children.length === 0) return []
    return [describe('Unconfigure the shell profiles', children.map(d => d.description))]
  }

  async execute(ctx: ActionContext): Promise<void> {
    await executeSequential(this.createDirectories, ctx)
    await executeConcurrent(this.createOrAppendFiles, ctx)
  }

  async revert(ctx: ActionContext): Promise<void> {
    const errors: ActionError[] = []
    try {
      await revertConcurrent(this.createOrAppendFiles, ctx)
    } catch (e) {
      errors.push(toActionError(e))
    }
    try {
      await revertSequential(this.createDirectories, ctx)
    } catch (e) {
      errors.push(toActionError(e))
    }
    const err = collectErrors(errors)
    if (err) throw err
  }

  toJSON(): Record<string, unknown> {
    return {
      createDirectories: this.createDirectories.map(d => d.toJSON()),
      createOrAppendFiles: this.createOrAppendFiles.map(f => f.toJSON()),
    }
  }
}
