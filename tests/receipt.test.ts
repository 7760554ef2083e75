import fs from 'fs-extra'
import path from 'node:path'
import { beforeEach, describe, expect, it } from 'vitest'

import { CreateDirectory } from '../src/actions/base/create-directory.js'
import { UnknownActionError, decodeStatefulAction } from '../src/actions/registry.js'
import { noopLogger } from '../src/core/log.js'
import { InstallPlan, PlanError, planWith } from '../src/core/plan.js'
import { StatefulAction } from '../src/core/stateful.js'
import { loadReceipt, loadReceiptIfExists, saveReceipt } from '../src/receipt/io.js'
import { parseSettings } from '../src/settings.js'
import { FakeLeaf, fakeProbe, mkCtx, mkTmp, rejection } from './helpers.js'

const settings = parseSettings({ packageUrl: 'https://example.invalid/nix.tar.xz', daemonUserCount: 2 }, 'linux', 'x64')

function planErrorKind(e: unknown): string {
  if (!(e instanceof PlanError)) throw new Error(`expected PlanError, got ${String(e)}`)
  return e.kind
}

function linuxPlan(): Promise<InstallPlan> {
  const probe = fakeProbe({
    pathExists: async (p) => p === '/etc',
    lookupGroup: async (name) => ({ name, gid: 30000 }),
  })
  return planWith('linux', settings, { logger: noopLogger(), probe })
}

let tmp: string

beforeEach(async () => {
  tmp = await mkTmp()
})

describe('receipt round trip', () => {
  it('decodes to the same plan it was written from', async () => {
    const plan = await linuxPlan()
    const text = JSON.stringify(plan)

    const restored = InstallPlan.fromJSON(JSON.parse(text))

    expect(JSON.stringify(restored)).toBe(text)
    expect(restored.planner).toEqual(plan.planner)
    expect(restored.actions.map(a => a.action.tag)).toEqual(['provision_nix', 'configure_nix', 'configure_init_service'])
    expect(restored.actions.map(a => a.state)).toEqual(plan.actions.map(a => a.state))
  })

  it('keeps leaf states and recomputes composite states', async () => {
    const plan = await linuxPlan()
    const json = plan.toJSON()

    expect(json.version).toBe(1)
    expect(json.actions.map(a => a.state)).toEqual([undefined, undefined, 'Uncompleted'])
    const provision = json.actions[0].action
    expect(provision.action_name).toBe('provision_nix')
    expect(provision).toMatchObject({ createUsersAndGroup: { action: { createGroup: { state: 'Skipped' } } } })
  })

  it('persists completed actions through save and load', async () => {
    const dir = path.join(tmp, 'made')
    const plan = new InstallPlan({ planner: 'linux', settings }, [await CreateDirectory.plan({ path: dir })])
    await plan.install(mkCtx())
    const receiptPath = path.join(tmp, 'receipt.json')

    await saveReceipt(receiptPath, plan)

    expect((await fs.readFile(receiptPath, 'utf8')).endsWith('}\n')).toBe(true)
    const loaded = await loadReceipt(receiptPath)
    expect(loaded.actions.map(a => a.state)).toEqual(['Completed'])
    expect(loaded.isComplete()).toBe(true)
    expect(loaded.describeUninstall().split('\n')).toContain(`- Remove the directory \`${dir}\` if no other contents exist`)
  })
})

describe('receipt validation', () => {
  const valid = () => ({
    version: 1,
    planner: { planner: 'linux', settings },
    actions: [{ action: { action_name: 'create_directory', path: '/nix' }, state: 'Completed' }],
  })

  it('accepts a well-formed receipt', () => {
    const plan = InstallPlan.fromJSON(valid())
    expect(plan.actions[0].state).toBe('Completed')
  })

  it('rejects an unknown version', () => {
    expect(planErrorKind(rejectionOf(() => InstallPlan.fromJSON({ ...valid(), version: 2 })))).toBe('receipt_version')
    expect(planErrorKind(rejectionOf(() => InstallPlan.fromJSON({ ...valid(), version: undefined })))).toBe('receipt_version')
  })

  it('rejects a receipt with an unknown action', () => {
    const raw = { ...valid(), actions: [{ action: { action_name: 'format_disk' }, state: 'Completed' }] }
    expect(planErrorKind(rejectionOf(() => InstallPlan.fromJSON(raw)))).toBe('receipt_invalid')
  })

  it('rejects an unknown state', () => {
    const raw = { ...valid(), actions: [{ action: { action_name: 'create_directory', path: '/nix' }, state: 'Done' }] }
    expect(planErrorKind(rejectionOf(() => InstallPlan.fromJSON(raw)))).toBe('receipt_invalid')
  })

  it('rejects action parameters that do not validate', () => {
    const raw = { ...valid(), actions: [{ action: { action_name: 'create_directory', path: 42 }, state: 'Completed' }] }
    expect(planErrorKind(rejectionOf(() => InstallPlan.fromJSON(raw)))).toBe('receipt_invalid')
  })

  it('rejects an unknown planner and bad settings', () => {
    expect(planErrorKind(rejectionOf(() => InstallPlan.fromJSON({ ...valid(), planner: { planner: 'freebsd', settings } }))))
      .toBe('receipt_invalid')
    const badSettings = { ...settings, daemonUserCount: -1 }
    expect(planErrorKind(rejectionOf(() => InstallPlan.fromJSON({ ...valid(), planner: { planner: 'linux', settings: badSettings } }))))
      .toBe('receipt_invalid')
  })

  it('reports unknown tags through the registry', () => {
    expect(() => decodeStatefulAction({ action: { action_name: 'format_disk' } })).toThrow(UnknownActionError)
  })

  it('reports a missing or unreadable receipt file', async () => {
    expect(planErrorKind(await rejection(loadReceipt(path.join(tmp, 'absent.json'))))).toBe('receipt_invalid')
    expect(await loadReceiptIfExists(path.join(tmp, 'absent.json'))).toBeUndefined()

    const broken = path.join(tmp, 'broken.json')
    await fs.writeFile(broken, '{ not json')
    expect(planErrorKind(await rejection(loadReceipt(broken)))).toBe('receipt_invalid')
  })
})

describe('InstallPlan', () => {
  it('refuses a receipt made with other settings', async () => {
    const plan = await linuxPlan()
    const other = parseSettings({ ...settings, daemonUserCount: 3 }, 'linux', 'x64')

    expect(() => plan.checkCompatible({ planner: 'linux', settings })).not.toThrow()
    expect(planErrorKind(rejectionOf(() => plan.checkCompatible({ planner: 'linux', settings: other })))).toBe('receipt_mismatch')
  })

  it('installs in order and stops at the first failure', async () => {
    const log: string[] = []
    const plan = new InstallPlan({ planner: 'linux', settings }, [
      StatefulAction.uncompleted(new FakeLeaf('a', log)),
      StatefulAction.uncompleted(new FakeLeaf('failing_leaf', log, { failExecute: true })),
      StatefulAction.uncompleted(new FakeLeaf('c', log)),
    ])

    const err = await rejection(plan.install(mkCtx()))

    expect(planErrorKind(err)).toBe('action')
    expect(err instanceof Error && err.message).toBe('Install failed: Child action `failing_leaf` (Fake failing_leaf): failing_leaf failed')
    expect(log).toEqual(['execute:a', 'execute:failing_leaf'])
    expect(plan.isComplete()).toBe(false)
  })

  it('uninstalls in reverse order', async () => {
    const log: string[] = []
    const plan = new InstallPlan({ planner: 'linux', settings }, [
      StatefulAction.completed(new FakeLeaf('a', log)),
      StatefulAction.completed(new FakeLeaf('b', log)),
    ])

    await plan.uninstall(mkCtx())

    expect(log).toEqual(['revert:b', 'revert:a'])
    expect(plan.actions.map(a => a.state)).toEqual(['Uncompleted', 'Uncompleted'])
  })

  it('reports every failed revert', async () => {
    const plan = new InstallPlan({ planner: 'linux', settings }, [
      StatefulAction.completed(new FakeLeaf('a', [], { failRevert: true })),
      StatefulAction.completed(new FakeLeaf('b', [], { failRevert: true })),
    ])

    const err = await rejection(plan.uninstall(mkCtx()))

    if (!(err instanceof PlanError)) throw new Error(`expected PlanError, got ${String(err)}`)
    expect(err.kind).toBe('revert_failures')
    expect(err.revertErrors.map(e => e.message)).toEqual([
      'Child action `b` (Fake b): b could not be undone',
      'Child action `a` (Fake a): a could not be undone',
    ])
  })

  it('stops between actions when cancelled and leaves the rest untouched', async () => {
    const log: string[] = []
    const controller = new AbortController()
    const plan = new InstallPlan({ planner: 'linux', settings }, [
      StatefulAction.uncompleted(new FakeLeaf('a', log, { onExecute: () => controller.abort('interrupted') })),
      StatefulAction.uncompleted(new FakeLeaf('b', log)),
    ])

    const err = await rejection(plan.install(mkCtx(controller.signal)))

    expect(planErrorKind(err)).toBe('cancelled')
    expect(log).toEqual(['execute:a'])
    expect(plan.actions.map(a => a.state)).toEqual(['Completed', 'Uncompleted'])
  })

  it('describes the remaining work with the planner and settings', async () => {
    const plan = new InstallPlan({ planner: 'linux', settings }, [
      StatefulAction.completed(new FakeLeaf('done', [])),
      StatefulAction.uncompleted(new FakeLeaf('todo', [])),
    ])

    const lines = plan.describeInstall(true).split('\n')

    expect(lines[0]).toBe('Nix install plan (planner: linux)')
    expect(lines).toContain('* daemonUserCount: 2')
    expect(lines).toContain('* packageUrl: https://example.invalid/nix.tar.xz')
    expect(lines.slice(-2)).toEqual(['- Do todo', '  * Because todo'])
  })
})

function rejectionOf(run: () => unknown): unknown {
  try {
    run()
  } catch (e) {
    return e
  }
  throw new Error('expected an exception')
}
