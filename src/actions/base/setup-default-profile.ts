import os from 'node:os'
import path from 'path'
import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { executeCommand } from '../../core/command.js'
import { ActionError } from '../../core/errors.js'
import { readDir } from '../../core/fs-ops.js'
import { StatefulAction } from '../../core/stateful.js'

export const SetupDefaultProfileParams = z.object({
  storeDir: z.string().min(1),
  profile: z.string().min(1),
  sslCertFile: z.string().optional(),
})

export const NIX_STORE = '/nix/store'
export const DEFAULT_PROFILE = '/nix/var/nix/profiles/default'

export type SetupDefaultProfileInput = z.input<typeof SetupDefaultProfileParams>

// `<hash>-nix-2.11.1`, but not `<hash>-nix-2.11.1-man`.
const NIX_PACKAGE = /^[^-]+-nix-\d[^-]*$/
const CACERT_PACKAGE = /^[^-]+-nss-cacert-/
const CA_BUNDLE = 'etc/ssl/certs/ca-bundle.crt'

/**
 * Install the unpacked `nix` and `nss-cacert` store paths into the default profile, which
 * the daemon units and the shell profile snippets point into.
 */
export class SetupDefaultProfile implements Action {
  readonly tag = 'setup_default_profile'

  private constructor(private readonly params: z.output<typeof SetupDefaultProfileParams>) {}

  static async plan(input: SetupDefaultProfileInput): Promise<StatefulAction<SetupDefaultProfile>> {
    return StatefulAction.uncompleted(new SetupDefaultProfile(SetupDefaultProfileParams.parse(input)))
  }

  static fromJSON(raw: unknown): SetupDefaultProfile {
    return new SetupDefaultProfile(SetupDefaultProfileParams.parse(raw))
  }

  tracingSynopsis(): string {
    return 'Setup the default Nix profile'
  }

  tracingFields(): Record<string, unknown> {
    return { profile: this.params.profile }
  }

  executeDescription(): ActionDescription[] {
    return [describe(this.tracingSynopsis(), [
      `Install \`nix\` and \`nss-cacert\` from \`${this.params.storeDir}\` into \`${this.params.profile}\``,
    ])]
  }

  revertDescription(): ActionDescription[] {
    return []
  }

  private findPackage(entries: readonly string[], pattern: RegExp, name: string): string {
    const found = entries.filter(e => pattern.test(e)).sort().at(0)
    if (found === undefined) {
      throw new ActionError('custom', `Unarchived Nix store at \`${this.params.storeDir}\` did not appear to include a \`${name}\` location`)
    }
    return path.join(this.params.storeDir, found)
  }

  async execute(ctx: ActionContext): Promise<void> {
    const { storeDir, profile, sslCertFile } = this.params
    const entries = await readDir(storeDir)
    const nixPkg = this.findPackage(entries, NIX_PACKAGE, 'nix')
    const cacertPkg = this.findPackage(entries, CACERT_PACKAGE, 'nss-cacert')

    await executeCommand(path.join(nixPkg, 'bin', 'nix-env'), ['--profile', profile, '-i', nixPkg, '-i', cacertPkg], {
      logger: ctx.logger,
      env: { HOME: os.homedir() },
      sslCertFile: sslCertFile ?? path.join(cacertPkg, CA_BUNDLE),
    })
  }

  // The profile lives under `/nix`, which the tree revert prunes.
  async revert(_ctx: ActionContext): Promise<void> {}

  toJSON(): Record<string, unknown> {
    return { ...this.params }
  }
}
