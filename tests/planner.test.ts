import path from 'node:path'
import { describe, expect, it } from 'vitest'

import { CreateGroup } from '../src/actions/base/create-group.js'
import { CreateUser } from '../src/actions/base/create-user.js'
import { FetchAndUnpackNix } from '../src/actions/base/fetch-and-unpack-nix.js'
import { ConfigureShellProfile } from '../src/actions/common/configure-shell-profile.js'
import { CreateUsersAndGroup } from '../src/actions/common/create-users-and-group.js'
import { ActionError } from '../src/core/errors.js'
import { noopLogger } from '../src/core/log.js'
import { planWith } from '../src/core/plan.js'
import { createPlanner, defaultPlannerTag, isPlannerTag } from '../src/planner/index.js'
import { parseSettings } from '../src/settings.js'
import { fakeProbe, rejection } from './helpers.js'

const settings = parseSettings({ packageUrl: 'https://example.invalid/nix.tar.xz', daemonUserCount: 2 }, 'linux', 'x64')

async function kindOf(p: Promise<unknown>): Promise<string> {
  const err = await rejection(p)
  if (!(err instanceof ActionError)) throw new Error(`expected ActionError, got ${String(err)}`)
  return err.kind
}

describe('create_group', () => {
  it('is uncompleted when the group is missing', async () => {
    const group = await CreateGroup.plan({ name: 'nixbld', gid: 30000 }, fakeProbe())
    expect(group.state).toBe('Uncompleted')
  })

  it('is skipped when the group already exists with the planned gid', async () => {
    const probe = fakeProbe({ lookupGroup: async (name) => ({ name, gid: 30000 }) })
    const group = await CreateGroup.plan({ name: 'nixbld', gid: 30000 }, probe)
    expect(group.state).toBe('Skipped')
  })

  it('refuses a group with another gid', async () => {
    const probe = fakeProbe({ lookupGroup: async (name) => ({ name, gid: 100 }) })
    expect(await kindOf(CreateGroup.plan({ name: 'nixbld', gid: 30000 }, probe))).toBe('group_gid_mismatch')
  })

  it('needs a command to create groups', async () => {
    const probe = fakeProbe({ commandExists: async (c) => c !== 'groupadd' && c !== 'addgroup' })
    expect(await kindOf(CreateGroup.plan({ name: 'nixbld', gid: 30000 }, probe))).toBe('missing_command')
  })
})

describe('create_user', () => {
  const input = { name: 'nixbld1', uid: 30001, groupName: 'nixbld', gid: 30000, comment: 'Nix build user 1' }

  it('is skipped when the user already exists as planned', async () => {
    const probe = fakeProbe({ lookupUser: async (name) => ({ name, uid: 30001, gid: 30000 }) })
    expect((await CreateUser.plan(input, probe)).state).toBe('Skipped')
  })

  it('refuses a user with another uid or gid', async () => {
    const otherUid = fakeProbe({ lookupUser: async (name) => ({ name, uid: 1000, gid: 30000 }) })
    const otherGid = fakeProbe({ lookupUser: async (name) => ({ name, uid: 30001, gid: 100 }) })
    expect(await kindOf(CreateUser.plan(input, otherUid))).toBe('user_uid_mismatch')
    expect(await kindOf(CreateUser.plan(input, otherGid))).toBe('user_gid_mismatch')
  })

  it('needs a command to delete users', async () => {
    const probe = fakeProbe({ commandExists: async (c) => c !== 'userdel' && c !== 'deluser' })
    expect(await kindOf(CreateUser.plan(input, probe))).toBe('missing_command')
  })
})

describe('create_users_and_group', () => {
  it('numbers the build users from the base id', async () => {
    const action = await CreateUsersAndGroup.plan({ ...settings, daemonUserCount: 3 }, fakeProbe())
    expect(action.action.tracingSynopsis()).toBe('Create build users (UID 30001-30003) and group (GID 30000)')
    expect(action.action.children().map(c => c.action.tracingSynopsis())).toEqual([
      'Create group `nixbld` (GID 30000)',
      'Create user `nixbld1` (UID 30001) in group `nixbld` (GID 30000)',
      'Create user `nixbld2` (UID 30002) in group `nixbld` (GID 30000)',
      'Create user `nixbld3` (UID 30003) in group `nixbld` (GID 30000)',
    ])
  })
})

describe('fetch_and_unpack_nix', () => {
  it('accepts http, https and file urls', async () => {
    for (const url of ['http://example.invalid/nix.tar.xz', 'https://example.invalid/nix.tar.xz', 'file:///tmp/nix.tar.xz']) {
      const action = await FetchAndUnpackNix.plan({ url, dest: '/nix/temp-install-dir' })
      expect(action.state).toBe('Uncompleted')
    }
  })

  it('rejects other schemes', async () => {
    expect(await kindOf(FetchAndUnpackNix.plan({ url: 'ftp://example.invalid/nix.tar.xz', dest: '/tmp/x' }))).toBe('unsupported_url')
  })
})

describe('configure_shell_profile', () => {
  it('only targets shells whose configuration directory exists', async () => {
    const root = '/rehearsal'
    const existing = new Set([path.join(root, 'etc'), path.join(root, 'etc/fish')])
    const probe = fakeProbe({ pathExists: async (p) => existing.has(p) })

    const profile = await ConfigureShellProfile.plan({ root }, probe)

    expect(profile.action.children().map(c => c.action.tracingSynopsis())).toEqual([
      'Create directory `/rehearsal/etc/fish/conf.d`',
      'Create or append file `/rehearsal/etc/bashrc`',
      'Create or append file `/rehearsal/etc/zshenv`',
      'Create or append file `/rehearsal/etc/bash.bashrc`',
      'Create or append file `/rehearsal/etc/fish/conf.d/nix.fish`',
    ])
  })
})

describe('planners', () => {
  it('knows the linux planner', () => {
    expect(isPlannerTag('linux')).toBe(true)
    expect(isPlannerTag('freebsd')).toBe(false)
    expect(defaultPlannerTag('linux')).toBe('linux')
    expect(defaultPlannerTag('win32')).toBeUndefined()
    expect(createPlanner('linux', settings).settings()).toEqual(settings)
  })

  it('plans provisioning, configuration and the init service in that order', async () => {
    const plan = await planWith('linux', settings, { logger: noopLogger(), probe: fakeProbe() })
    expect(plan.planner).toEqual({ planner: 'linux', settings })
    expect(plan.actions.map(a => a.action.tag)).toEqual(['provision_nix', 'configure_nix', 'configure_init_service'])
    expect(plan.actions.map(a => a.state)).toEqual(['Uncompleted', 'Uncompleted', 'Uncompleted'])
  })

  it('leaves the init system alone when asked to', async () => {
    const none = parseSettings({ ...settings, initSystem: 'none' }, 'linux', 'x64')
    const plan = await planWith('linux', none, { logger: noopLogger(), probe: fakeProbe() })
    expect(plan.actions.map(a => a.action.tag)).toEqual(['provision_nix', 'configure_nix'])
  })

  it('places every host path under the configured root', async () => {
    const rooted = parseSettings({ ...settings, root: '/rehearsal', initSystem: 'none' }, 'linux', 'x64')
    const plan = await planWith('linux', rooted, { logger: noopLogger(), probe: fakeProbe() })
    const lines = plan.describeInstall().split('\n')
    expect(lines).toContain('- Fetch `https://example.invalid/nix.tar.xz` to `/rehearsal/nix/temp-install-dir`')
    expect(lines).toContain('- Move the downloaded Nix into `/rehearsal/nix`')
  })
})
