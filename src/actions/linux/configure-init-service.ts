import path from 'path'
import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { executeCommand } from '../../core/command.js'
import { ActionError } from '../../core/errors.js'
import { nodeProbe, readSymlink } from '../../core/fs.js'
import type { HostProbe } from '../../core/fs.js'
import { ensureSymlink, removeSymlink } from '../../core/fs-ops.js'
import { StatefulAction } from '../../core/stateful.js'

export const ConfigureInitServiceParams = z.object({
  serviceSrc: z.string().min(1),
  socketSrc: z.string().min(1),
  unitDir: z.string().min(1),
  start: z.boolean().default(true),
})

export type ConfigureInitServiceInput = z.input<typeof ConfigureInitServiceParams>

interface UnitLink {
  src: string
  dest: string
}

function unitLinks(params: z.output<typeof ConfigureInitServiceParams>): UnitLink[] {
  return [params.serviceSrc, params.socketSrc].map(src => ({ src, dest: path.join(params.unitDir, path.basename(src)) }))
}

/**
 * A unit may already be in place only as a link to the unit we would link, and must not
 * have drop-in overrides.
 */
async function checkUnitLink({ src, dest }: UnitLink, probe: HostProbe): Promise<void> {
  const target = await probe.readSymlink(dest)
  if (target !== undefined && target !== src) {
    throw new ActionError('exists', `Unit \`${dest}\` already exists and links to \`${target}\`, not \`${src}\``)
  }
  if (target === undefined && await probe.pathExists(dest)) {
    throw new ActionError('exists', `Unit \`${dest}\` already exists and is not a link to \`${src}\``)
  }
  if (await probe.pathExists(`${dest}.d`)) {
    throw new ActionError('exists', `Unit overrides exist in \`${dest}.d\``)
  }
}

/**
 * Link the daemon's service and socket units into systemd's unit directory and (optionally)
 * start the socket.
 */
export class ConfigureInitService implements Action {
  readonly tag = 'configure_init_service'

  private constructor(private readonly params: z.output<typeof ConfigureInitServiceParams>) {}

  static async plan(input: ConfigureInitServiceInput, probe: HostProbe = nodeProbe): Promise<StatefulAction<ConfigureInitService>> {
    const params = ConfigureInitServiceParams.parse(input)
    if (!await probe.commandExists('systemctl')) {
      throw new ActionError('missing_command', 'Could not find `systemctl` in PATH; the daemon can not be configured without systemd')
    }
    for (const link of unitLinks(params)) {
      await checkUnitLink(link, probe)
    }
    return StatefulAction.uncompleted(new ConfigureInitService(params))
  }

  static fromJSON(raw: unknown): ConfigureInitService {
    return new ConfigureInitService(ConfigureInitServiceParams.parse(raw))
  }

  private get links(): UnitLink[] {
    return unitLinks(this.params)
  }

  private get socketUnit(): string {
    return path.basename(this.params.socketSrc)
  }

  tracingSynopsis(): string {
    return 'Configure Nix daemon related settings with systemd'
  }

  tracingFields(): Record<string, unknown> {
    return { unitDir: this.params.unitDir, start: this.params.start }
  }

  executeDescription(): ActionDescription[] {
    const explanation = [
      ...this.links.map(l => `Link \`${l.src}\` into \`${this.params.unitDir}\``),
      'Run `systemctl daemon-reload`',
    ]
    if (this.params.start) explanation.push(`Run \`systemctl enable --now ${this.socketUnit}\``)
    return [describe(this.tracingSynopsis(), explanation)]
  }

  revertDescription(): ActionDescription[] {
    return [describe('Unconfigure Nix daemon related settings with systemd', [
      `Run \`systemctl disable --now ${this.socketUnit}\``,
      ...this.links.map(l => `Remove \`${l.dest}\``),
      'Run `systemctl daemon-reload`',
    ])]
  }

  async execute(ctx: ActionContext): Promise<void> {
    for (const { src, dest } of this.links) {
      // Left behind by an earlier attempt.
      if (await readSymlink(dest) === src) continue
      await ensureSymlink(src, dest)
    }
    await executeCommand('systemctl', ['daemon-reload'], { logger: ctx.logger })
    if (this.params.start) {
      await executeCommand('systemctl', ['enable', '--now', this.socketUnit], { logger: ctx.logger })
    }
  }

  async revert(ctx: ActionContext): Promise<void> {
    // Unlinking goes ahead even if the socket could not be disabled.
    let disableError: unknown
    try {
      await executeCommand('systemctl', ['disable', '--now', this.socketUnit], { logger: ctx.logger })
    } catch (e) {
      disableError = e
    }
    for (const { src, dest } of this.links) {
      if (await readSymlink(dest) !== src) continue
      await removeSymlink(dest)
    }
    await executeCommand('systemctl', ['daemon-reload'], { logger: ctx.logger })
    if (disableError !== undefined) throw disableError
  }

  toJSON(): Record<string, unknown> {
    return { ...this.params }
  }
}
