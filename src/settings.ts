import path from 'path'
import { z } from 'zod'

export type BuildUserConcurrency = 'sequential' | 'concurrent'
export type InitSystem = 'systemd' | 'none'

const NIX_VERSION = '2.11.1'

/**
 * Release tarball for the host, or `undefined` where no build is published.
 */
export function defaultPackageUrl(platform: NodeJS.Platform = process.platform, arch: string = process.arch): string | undefined {
  const os = platform === 'linux' ? 'linux' : platform === 'darwin' ? 'darwin' : undefined
  const cpu = arch === 'x64' ? 'x86_64' : arch === 'arm64' ? 'aarch64' : undefined
  if (!os || !cpu) return undefined
  return `https://releases.nixos.org/nix/nix-${NIX_VERSION}/nix-${NIX_VERSION}-${cpu}-${os}.tar.xz`
}

/**
 * Build users are created one at a time on darwin, where the directory service does not
 * take concurrent writes well.
 */
export function defaultBuildUserConcurrency(platform: NodeJS.Platform = process.platform): BuildUserConcurrency {
  return platform === 'darwin' ? 'sequential' : 'concurrent'
}

export function commonSettingsSchema(platform: NodeJS.Platform = process.platform, arch: string = process.arch) {
  const packageUrl = defaultPackageUrl(platform, arch)
  return z.object({
    daemonUserCount: z.number().int().positive().default(32),
    buildGroupName: z.string().min(1).default('nixbld'),
    buildGroupId: z.number().int().nonnegative().default(30000),
    buildUserPrefix: z.string().min(1).default('nixbld'),
    buildUserIdBase: z.number().int().nonnegative().default(30000),
    packageUrl: packageUrl === undefined ? z.string().url() : z.string().url().default(packageUrl),
    extraConf: z.array(z.string()).default([]),
    modifyProfile: z.boolean().default(true),
    force: z.boolean().default(false),
    sslCertFile: z.string().min(1).optional(),
    buildUserConcurrency: z.enum(['sequential', 'concurrent']).default(defaultBuildUserConcurrency(platform)),
    initSystem: z.enum(['systemd', 'none']).default('systemd'),
    root: z.string().min(1).default('/'),
  }).strict()
}

export type CommonSettings = z.output<ReturnType<typeof commonSettingsSchema>>
export type CommonSettingsInput = z.input<ReturnType<typeof commonSettingsSchema>>

export function parseSettings(input: unknown, platform?: NodeJS.Platform, arch?: string): CommonSettings {
  return commonSettingsSchema(platform, arch).parse(input)
}

const ENV_PREFIX = 'NIXUP_'

type SettingKey = keyof CommonSettings
type Coerce = (raw: string) => unknown

const toInt: Coerce = (raw) => (/^\d+$/.test(raw.trim()) ? Number(raw.trim()) : raw)
const toBool: Coerce = (raw) => {
  const v = raw.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(v)) return true
  if (['0', 'false', 'no', 'off', ''].includes(v)) return false
  return raw
}
const toStr: Coerce = (raw) => raw
const toLines: Coerce = (raw) => raw.split('\n').filter(l => l.length > 0)

/**
 * Environment variable suffix (after `NIXUP_`) and coercion for every setting.
 */
export const SETTING_ENV: ReadonlyArray<[SettingKey, string, Coerce]> = [
  ['daemonUserCount', 'DAEMON_USER_COUNT', toInt],
  ['buildGroupName', 'BUILD_GROUP_NAME', toStr],
  ['buildGroupId', 'BUILD_GROUP_ID', toInt],
  ['buildUserPrefix', 'BUILD_USER_PREFIX', toStr],
  ['buildUserIdBase', 'BUILD_USER_ID_BASE', toInt],
  ['packageUrl', 'PACKAGE_URL', toStr],
  ['extraConf', 'EXTRA_CONF', toLines],
  ['modifyProfile', 'MODIFY_PROFILE', toBool],
  ['force', 'FORCE', toBool],
  ['sslCertFile', 'SSL_CERT_FILE', toStr],
  ['buildUserConcurrency', 'BUILD_USER_CONCURRENCY', toStr],
  ['initSystem', 'INIT_SYSTEM', toStr],
  ['root', 'ROOT', toStr],
]

export type RawSettings = Partial<Record<SettingKey, unknown>>

/**
 * Settings given through `NIXUP_*` variables, coerced but not yet validated.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): RawSettings {
  const out: RawSettings = {}
  for (const [key, suffix, coerce] of SETTING_ENV) {
    const raw = env[`${ENV_PREFIX}${suffix}`]
    if (raw !== undefined) out[key] = coerce(raw)
  }
  return out
}

export interface ResolveSettingsOptions {
  env?: NodeJS.ProcessEnv
  flags?: RawSettings
  platform?: NodeJS.Platform
  arch?: string
}

/**
 * Defaults, then `NIXUP_*` environment, then flags.
 */
export function resolveSettings(opts: ResolveSettingsOptions = {}): CommonSettings {
  const fromEnv = settingsFromEnv(opts.env ?? process.env)
  const flags = Object.fromEntries(Object.entries(opts.flags ?? {}).filter(([, v]) => v !== undefined))
  return parseSettings({ ...fromEnv, ...flags }, opts.platform, opts.arch)
}

/**
 * An absolute host path placed under the settings' `root` prefix.
 */
export function underRoot(root: string, p: string): string {
  return path.join(root, p)
}
