import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

vi.mock('../src/api/install.js', () => ({ install: vi.fn() }))
vi.mock('../src/api/uninstall.js', () => ({ uninstall: vi.fn() }))
vi.mock('../src/cli/interaction.js', () => ({ confirm: vi.fn() }))

import { CreateDirectory } from '../src/actions/base/create-directory.js'
import { install } from '../src/api/install.js'
import { uninstall } from '../src/api/uninstall.js'
import { main } from '../src/cli.js'
import { ConfigFileError, getGlobalConfigPath, readGlobalConfig } from '../src/cli/config.js'
import { confirm } from '../src/cli/interaction.js'
import { InstallPlan } from '../src/core/plan.js'
import { mkResult } from '../src/core/runner.js'
import { StatefulAction } from '../src/core/stateful.js'
import { saveReceipt } from '../src/receipt/io.js'
import { parseSettings } from '../src/settings.js'

const settingsInput = { packageUrl: 'https://example.invalid/nix.tar.xz', daemonUserCount: 2 }

describe('cli', () => {
  let tmp: string
  let origXdg: string | undefined
  let origCwd: string
  let output: string[]
  const canon = (p: string) => (p.startsWith('/private/') ? p.slice('/private'.length) : p)
  const printed = () => output.join('')

  async function writeReceipt(name: string, state: 'Uncompleted' | 'Completed'): Promise<string> {
    const p = path.join(tmp, name)
    const action = CreateDirectory.fromJSON({ path: path.join(tmp, 'made') })
    const plan = new InstallPlan({ planner: 'linux', settings: parseSettings(settingsInput) }, [new StatefulAction(action, state)])
    await saveReceipt(p, plan)
    return p
  }

  beforeEach(async () => {
    vi.resetAllMocks()
    origXdg = process.env.XDG_CONFIG_HOME
    origCwd = process.cwd()

    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'nixup-test-'))
    process.env.XDG_CONFIG_HOME = tmp
    process.chdir(tmp)
    await fs.remove(getGlobalConfigPath({ env: process.env, homeDir: tmp }))

    output = []
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      output.push(String(chunk))
      return true
    })
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    vi.mocked(uninstall).mockImplementation(async (receiptPath) => ({ result: mkResult('uninstall', receiptPath) }))
    vi.mocked(install).mockImplementation(async (plan, opts) => ({ result: mkResult('install', opts?.receiptPath), plan }))
  })

  afterEach(() => {
    vi.restoreAllMocks()
    process.chdir(origCwd)
    if (origXdg === undefined) delete process.env.XDG_CONFIG_HOME
    else process.env.XDG_CONFIG_HOME = origXdg
  })

  it('receipt set writes the absolute path into XDG config and show prints it', async () => {
    expect(await main(['receipt', 'set', 'r.json'])).toBe(0)

    const cfg = await fs.readJson(getGlobalConfigPath({ env: process.env, homeDir: tmp }))
    expect(canon(cfg.receiptPath)).toBe(canon(path.join(tmp, 'r.json')))

    output = []
    expect(await main(['receipt', 'show'])).toBe(0)
    expect(canon(printed().trim())).toBe(canon(path.join(tmp, 'r.json')))
  })

  it('receipt clear removes the default so show fails', async () => {
    await main(['receipt', 'set', 'r.json'])
    expect(await main(['receipt', 'clear'])).toBe(0)
    expect(await main(['receipt', 'show'])).toBe(2)
  })

  it('refuses a stored default receipt that is not an absolute path', async () => {
    const cfgPath = getGlobalConfigPath({ env: process.env, homeDir: tmp })
    await fs.outputJson(cfgPath, { receiptPath: 'relative/receipt.json' })

    const err = await readGlobalConfig({ env: process.env }).catch((e: unknown) => e)
    if (!(err instanceof ConfigFileError)) throw new Error(`expected ConfigFileError, got ${String(err)}`)
    expect(err.issues).toEqual(['receiptPath: must be an absolute path'])
    expect(err.message).toBe(`Invalid config \`${cfgPath}\`: receiptPath: must be an absolute path. Fix it or run \`nixup receipt clear\`.`)

    expect(await main(['receipt', 'show'])).toBe(1)
    expect(await main(['receipt', 'clear'])).toBe(0)
    expect(await main(['receipt', 'show'])).toBe(2)
  })

  it('uninstall uses the default receipt when --receipt is not given', async () => {
    const receiptPath = await writeReceipt('default.json', 'Completed')
    await main(['receipt', 'set', receiptPath])

    expect(await main(['uninstall', '--no-confirm'])).toBe(0)

    expect(uninstall).toHaveBeenCalledTimes(1)
    expect(canon(vi.mocked(uninstall).mock.calls[0][0] ?? '')).toBe(canon(receiptPath))
    expect(vi.mocked(uninstall).mock.calls[0][1]?.expect).toBeUndefined()
  })

  it('uninstall prefers --receipt over the default', async () => {
    await main(['receipt', 'set', path.join(tmp, 'default.json')])
    const receiptPath = await writeReceipt('override.json', 'Completed')

    expect(await main(['uninstall', '--no-confirm', '--receipt', 'override.json'])).toBe(0)

    expect(canon(vi.mocked(uninstall).mock.calls[0][0] ?? '')).toBe(canon(receiptPath))
  })

  it('uninstall refuses a receipt made with other settings', async () => {
    await writeReceipt('r.json', 'Completed')

    const code = await main(['uninstall', '--no-confirm', '--receipt', 'r.json', '--package-url', settingsInput.packageUrl, '--daemon-user-count', '5'])

    expect(code).toBe(1)
    expect(uninstall).not.toHaveBeenCalled()
  })

  it('uninstall passes matching settings on as the expected record', async () => {
    await writeReceipt('r.json', 'Completed')

    const code = await main(['uninstall', '--no-confirm', '--receipt', 'r.json', '--package-url', settingsInput.packageUrl, '--daemon-user-count', '2'])

    expect(code).toBe(0)
    expect(vi.mocked(uninstall).mock.calls[0][1]?.expect).toEqual({ planner: 'linux', settings: parseSettings(settingsInput) })
  })

  it('does nothing when the prompt is declined', async () => {
    await writeReceipt('r.json', 'Completed')
    vi.mocked(confirm).mockResolvedValue(false)

    expect(await main(['uninstall', '--receipt', 'r.json'])).toBe(0)

    expect(confirm).toHaveBeenCalledWith('Proceed with the uninstallation?')
    expect(uninstall).not.toHaveBeenCalled()
    expect(printed()).toContain("Okay, didn't do anything!")
  })

  it('install runs a saved plan against the given receipt', async () => {
    const planFile = await writeReceipt('plan.json', 'Uncompleted')

    expect(await main(['install', '--plan', planFile, '--receipt', 'receipt.json', '--no-confirm'])).toBe(0)

    expect(install).toHaveBeenCalledTimes(1)
    const [plan, opts] = vi.mocked(install).mock.calls[0]
    expect(plan.actions.map(a => a.state)).toEqual(['Uncompleted'])
    expect(canon(opts?.receiptPath ?? '')).toBe(canon(path.join(tmp, 'receipt.json')))
  })

  it('install stops early when the receipt says it is complete', async () => {
    const planFile = await writeReceipt('plan.json', 'Uncompleted')
    const receiptPath = await writeReceipt('receipt.json', 'Completed')

    expect(await main(['install', '--plan', planFile, '--receipt', receiptPath, '--no-confirm'])).toBe(0)

    expect(install).not.toHaveBeenCalled()
    expect(printed()).toBe(`Nix is already installed according to \`${receiptPath}\`; nothing to do.\n`)
  })

  it('install offers to revert after a failure', async () => {
    const planFile = await writeReceipt('plan.json', 'Uncompleted')
    vi.mocked(install).mockImplementation(async (plan, opts) => {
      const result = mkResult('install', opts?.receiptPath)
      result.ok = false
      result.errors.push('Install failed: boom')
      return { result, plan }
    })

    expect(await main(['install', '--plan', planFile, '--receipt', 'receipt.json', '--no-confirm'])).toBe(1)

    expect(uninstall).toHaveBeenCalledTimes(1)
    expect(canon(vi.mocked(uninstall).mock.calls[0][0] ?? '')).toBe(canon(path.join(tmp, 'receipt.json')))
  })

  it('rejects unknown commands and arguments', async () => {
    expect(await main(['frobnicate'])).toBe(1)
    await writeReceipt('r.json', 'Completed')
    expect(await main(['uninstall', '--receipt', 'r.json', '--bogus'])).toBe(1)
    expect(uninstall).not.toHaveBeenCalled()
  })
})
