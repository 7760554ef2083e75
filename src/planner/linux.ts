import { DEFAULT_PROFILE } from '../actions/base/setup-default-profile.js'
import { ConfigureNix } from '../actions/common/configure-nix.js'
import { ProvisionNix } from '../actions/common/provision-nix.js'
import { ConfigureInitService } from '../actions/linux/configure-init-service.js'
import type { StatefulAction } from '../core/stateful.js'
import type { CommonSettings } from '../settings.js'
import { underRoot } from '../settings.js'
import type { PlanContext, Planner } from './index.js'

const SERVICE_SRC = `${DEFAULT_PROFILE}/lib/systemd/system/nix-daemon.service`
const SOCKET_SRC = `${DEFAULT_PROFILE}/lib/systemd/system/nix-daemon.socket`
const UNIT_DIR = '/etc/systemd/system'

/**
 * A multi-user install on a Linux host: provision the store, configure it, then hand the
 * daemon to the init system.
 */
export class LinuxPlanner implements Planner {
  readonly tag = 'linux'

  constructor(private readonly config: CommonSettings) {}

  settings(): CommonSettings {
    return this.config
  }

  async plan(ctx: PlanContext): Promise<StatefulAction[]> {
    const { root } = this.config
    ctx.logger.debug('Planning', { planner: this.tag, root })
    const actions: StatefulAction[] = [
      await ProvisionNix.plan(this.config, ctx.probe),
      await ConfigureNix.plan(this.config, ctx.probe),
    ]
    if (this.config.initSystem === 'systemd') {
      actions.push(await ConfigureInitService.plan({
        serviceSrc: underRoot(root, SERVICE_SRC),
        socketSrc: underRoot(root, SOCKET_SRC),
        unitDir: underRoot(root, UNIT_DIR),
        start: true,
      }, ctx.probe))
    }
    return actions
  }
}
