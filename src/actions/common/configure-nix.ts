import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describeExecuteAll, describeRevertAll, executeSequential, revertSequential } from '../../core/compose.js'
import { nodeProbe } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { StatefulAction, StatefulActionJsonSchema, restoreStateful } from '../../core/stateful.js'
import { underRoot } from '../../settings.js'
import type { CommonSettings } from '../../settings.js'
import { DEFAULT_PROFILE, NIX_STORE, SetupDefaultProfile } from '../base/setup-default-profile.js'
import { ConfigureShellProfile } from './configure-shell-profile.js'
import { PlaceNixConfiguration } from './place-nix-configuration.js'

const Json = z.object({
  setupDefaultProfile: StatefulActionJsonSchema,
  placeNixConfiguration: StatefulActionJsonSchema,
  configureShellProfile: StatefulActionJsonSchema.nullable(),
})

/**
 * Install Nix into the default profile, write `nix.conf`, then (unless disabled) hook Nix
 * into the shell profiles.
 */
export class ConfigureNix implements Action {
  readonly tag = 'configure_nix'

  private constructor(
    private readonly setupDefaultProfile: StatefulAction<SetupDefaultProfile>,
    private readonly placeNixConfiguration: StatefulAction<PlaceNixConfiguration>,
    private readonly configureShellProfile: StatefulAction<ConfigureShellProfile> | null,
  ) {}

  static async plan(settings: CommonSettings, probe: HostProbe = nodeProbe): Promise<StatefulAction<ConfigureNix>> {
    const setupDefaultProfile = await SetupDefaultProfile.plan({
      storeDir: underRoot(settings.root, NIX_STORE),
      profile: underRoot(settings.root, DEFAULT_PROFILE),
      sslCertFile: settings.sslCertFile,
    })
    const placeNixConfiguration = await PlaceNixConfiguration.plan(settings, probe)
    const configureShellProfile = settings.modifyProfile
      ? await ConfigureShellProfile.plan({ root: settings.root }, probe)
      : null
    return StatefulAction.uncompleted(new ConfigureNix(setupDefaultProfile, placeNixConfiguration, configureShellProfile))
  }

  static fromJSON(raw: unknown): ConfigureNix {
    const json = Json.parse(raw)
    return new ConfigureNix(
      restoreStateful(json.setupDefaultProfile, 'setup_default_profile', SetupDefaultProfile.fromJSON),
      restoreStateful(json.placeNixConfiguration, 'place_nix_configuration', PlaceNixConfiguration.fromJSON),
      json.configureShellProfile === null
        ? null
        : restoreStateful(json.configureShellProfile, 'configure_shell_profile', ConfigureShellProfile.fromJSON),
    )
  }

  children(): readonly StatefulAction[] {
    const children: StatefulAction[] = [this.setupDefaultProfile, this.placeNixConfiguration]
    if (this.configureShellProfile) children.push(this.configureShellProfile)
    return children
  }

  tracingSynopsis(): string {
    return 'Configure Nix'
  }

  tracingFields(): Record<string, unknown> {
    return { modifyProfile: this.configureShellProfile !== null }
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
    return {
      setupDefaultProfile: this.setupDefaultProfile.toJSON(),
      placeNixConfiguration: this.placeNixConfiguration.toJSON(),
      configureShellProfile: this.configureShellProfile ? this.configureShellProfile.toJSON() : null,
    }
  }
}
