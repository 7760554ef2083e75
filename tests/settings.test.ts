import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'

import {
  defaultBuildUserConcurrency,
  defaultPackageUrl,
  parseSettings,
  resolveSettings,
  settingsFromEnv,
  underRoot,
} from '../src/settings.js'

describe('settings', () => {
  it('fills in defaults for the host', () => {
    const s = parseSettings({}, 'linux', 'x64')
    expect(s).toEqual({
      daemonUserCount: 32,
      buildGroupName: 'nixbld',
      buildGroupId: 30000,
      buildUserPrefix: 'nixbld',
      buildUserIdBase: 30000,
      packageUrl: 'https://releases.nixos.org/nix/nix-2.11.1/nix-2.11.1-x86_64-linux.tar.xz',
      extraConf: [],
      modifyProfile: true,
      force: false,
      buildUserConcurrency: 'concurrent',
      initSystem: 'systemd',
      root: '/',
    })
  })

  it('knows the release tarball per platform', () => {
    expect(defaultPackageUrl('darwin', 'arm64')).toBe('https://releases.nixos.org/nix/nix-2.11.1/nix-2.11.1-aarch64-darwin.tar.xz')
    expect(defaultPackageUrl('win32', 'x64')).toBeUndefined()
    expect(defaultPackageUrl('linux', 'ia32')).toBeUndefined()
  })

  it('needs an explicit package url where no release is published', () => {
    expect(() => parseSettings({}, 'freebsd', 'x64')).toThrow(ZodError)
    expect(parseSettings({ packageUrl: 'file:///srv/nix.tar.xz' }, 'freebsd', 'x64').packageUrl).toBe('file:///srv/nix.tar.xz')
  })

  it('creates build users one at a time on darwin', () => {
    expect(defaultBuildUserConcurrency('darwin')).toBe('sequential')
    expect(defaultBuildUserConcurrency('linux')).toBe('concurrent')
    expect(parseSettings({}, 'darwin', 'arm64').buildUserConcurrency).toBe('sequential')
    expect(parseSettings({ buildUserConcurrency: 'concurrent' }, 'darwin', 'arm64').buildUserConcurrency).toBe('concurrent')
  })

  it('rejects unknown keys and invalid values', () => {
    expect(() => parseSettings({ daemonUsers: 3 }, 'linux', 'x64')).toThrow(ZodError)
    expect(() => parseSettings({ daemonUserCount: 0 }, 'linux', 'x64')).toThrow(ZodError)
    expect(() => parseSettings({ initSystem: 'openrc' }, 'linux', 'x64')).toThrow(ZodError)
  })
})

describe('settingsFromEnv', () => {
  it('reads and coerces NIXUP_* variables', () => {
    expect(settingsFromEnv({
      NIXUP_DAEMON_USER_COUNT: '4',
      NIXUP_MODIFY_PROFILE: 'no',
      NIXUP_FORCE: 'true',
      NIXUP_EXTRA_CONF: 'sandbox = false\nmax-jobs = 2\n',
      NIXUP_ROOT: '/mnt/target',
      UNRELATED: 'x',
    })).toEqual({
      daemonUserCount: 4,
      modifyProfile: false,
      force: true,
      extraConf: ['sandbox = false', 'max-jobs = 2'],
      root: '/mnt/target',
    })
  })

  it('passes values it can not coerce on for validation to reject', () => {
    const raw = settingsFromEnv({ NIXUP_DAEMON_USER_COUNT: 'many' })
    expect(raw).toEqual({ daemonUserCount: 'many' })
    expect(() => parseSettings(raw, 'linux', 'x64')).toThrow(ZodError)
  })
})

describe('resolveSettings', () => {
  it('applies defaults, then the environment, then flags', () => {
    const s = resolveSettings({
      env: { NIXUP_DAEMON_USER_COUNT: '4', NIXUP_BUILD_GROUP_NAME: 'envbld' },
      flags: { daemonUserCount: 8, buildGroupId: undefined },
      platform: 'linux',
      arch: 'x64',
    })
    expect(s.daemonUserCount).toBe(8)
    expect(s.buildGroupName).toBe('envbld')
    expect(s.buildGroupId).toBe(30000)
  })
})

describe('underRoot', () => {
  it('prefixes host paths', () => {
    expect(underRoot('/', '/nix/store')).toBe('/nix/store')
    expect(underRoot('/mnt/target', '/etc/nix/nix.conf')).toBe('/mnt/target/etc/nix/nix.conf')
  })
})
