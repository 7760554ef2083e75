#!/usr/bin/env node
import path from 'path'
import { fileURLToPath } from 'url'
import { ZodError } from 'zod'

import { install } from './api/install.js'
import { plan } from './api/plan.js'
import { uninstall } from './api/uninstall.js'
import { interruptSignal } from './core/cancel.js'
import { createPinoLogger } from './core/log.js'
import type { InstallPlan, PlannerRecord } from './core/plan.js'
import { PlanError } from './core/plan.js'
import { defaultPlannerTag, isPlannerTag } from './planner/index.js'
import type { PlannerTag } from './planner/index.js'
import { loadReceipt, loadReceiptIfExists, saveReceipt } from './receipt/io.js'
import { DEFAULT_RECEIPT_PATH } from './receipt/types.js'
import { resolveSettings } from './settings.js'
import type { CommonSettings, RawSettings } from './settings.js'
import type { Logger, Result } from './types.js'
import { ConfigFileError, clearDefaultReceiptPath, getDefaultReceiptPath, setDefaultReceiptPath } from './cli/config.js'
import { confirm } from './cli/interaction.js'

type Argv = string[]

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = 1) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = 1): never {
  throw new CliExit(msg, code)
}

function popFlagValue(args: Argv, names: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (!names.includes(a)) continue
    const v = args[i + 1]
    if (!v || v.startsWith('-')) die(`${a} requires a value`)
    args.splice(i, 2)
    return v
  }
  return undefined
}

function popFlagValues(args: Argv, names: string[]): string[] {
  const values: string[] = []
  for (let v = popFlagValue(args, names); v !== undefined; v = popFlagValue(args, names)) {
    values.push(v)
  }
  return values
}

function hasFlag(args: Argv, names: string[]): boolean {
  const idx = args.findIndex(a => names.includes(a))
  if (idx >= 0) {
    args.splice(idx, 1)
    return true
  }
  return false
}

function intFlag(args: Argv, name: string): number | string | undefined {
  const v = popFlagValue(args, [name])
  if (v === undefined) return undefined
  return /^\d+$/.test(v) ? Number(v) : v
}

/**
 * Settings given on the command line. Only flags actually passed appear in the result.
 */
function parseSettingsFlags(args: Argv): RawSettings {
  const extraConf = popFlagValues(args, ['--extra-conf'])
  const flags: RawSettings = {
    daemonUserCount: intFlag(args, '--daemon-user-count'),
    buildGroupName: popFlagValue(args, ['--build-group-name']),
    buildGroupId: intFlag(args, '--build-group-id'),
    buildUserPrefix: popFlagValue(args, ['--build-user-prefix']),
    buildUserIdBase: intFlag(args, '--build-user-id-base'),
    packageUrl: popFlagValue(args, ['--package-url']),
    extraConf: extraConf.length ? extraConf : undefined,
    modifyProfile: hasFlag(args, ['--no-modify-profile']) ? false : undefined,
    force: hasFlag(args, ['--force']) ? true : undefined,
    sslCertFile: popFlagValue(args, ['--ssl-cert-file']),
    buildUserConcurrency: popFlagValue(args, ['--build-user-concurrency']),
    initSystem: popFlagValue(args, ['--init-system']),
    root: popFlagValue(args, ['--root']),
  }
  return Object.fromEntries(Object.entries(flags).filter(([, v]) => v !== undefined))
}

function parsePlannerFlag(args: Argv): PlannerTag {
  const v = popFlagValue(args, ['--planner'])
  if (v !== undefined) {
    if (!isPlannerTag(v)) die(`Unknown planner: ${v}`)
    return v
  }
  return defaultPlannerTag() ?? die(`No planner supports this host (${process.platform}); pass --planner`)
}

interface RunFlags {
  noConfirm: boolean
  explain: boolean
  dryRun: boolean
  verbose: boolean
}

function parseRunFlags(args: Argv): RunFlags {
  return {
    noConfirm: hasFlag(args, ['--no-confirm']),
    explain: hasFlag(args, ['--explain']),
    dryRun: hasFlag(args, ['--dry-run']),
    verbose: hasFlag(args, ['-v', '--verbose']),
  }
}

function mkLogger(flags: RunFlags): Logger {
  return createPinoLogger({ level: flags.verbose ? 'debug' : process.env.NIXUP_LOG_LEVEL })
}

async function resolveReceiptPath(args: Argv): Promise<string> {
  const r = popFlagValue(args, ['--receipt'])
  if (r) return path.resolve(r)
  return await getDefaultReceiptPath() ?? DEFAULT_RECEIPT_PATH
}

function rejectLeftovers(args: Argv): void {
  if (args.length) die(`Unknown arguments: ${args.join(' ')}`)
}

function writeOut(text: string): void {
  process.stdout.write(text.endsWith('\n') ? text : text + '\n')
}

function writeResult(result: Result): void {
  const { planText: _planText, ...rest } = result
  writeOut(JSON.stringify(rest, null, 2))
}

function reportFailure(result: Result): void {
  for (const e of result.errors) process.stderr.write(`error: ${e}\n`)
  if (result.revertErrors.length) {
    process.stderr.write('\nReverting changes failed; these need manual attention:\n')
    for (const e of result.revertErrors) process.stderr.write(`  - ${e}\n`)
  }
  if (result.cancelled) process.stderr.write('Cancelled; completed actions were left in place.\n')
}

function printHelp(): void {
  const msg = `
nixup

Usage:
  nixup plan [--out <file>] [--planner <tag>] [settings]
  nixup install [--plan <file>] [--receipt <path>] [--no-confirm] [--explain] [--dry-run] [settings]
  nixup uninstall [--receipt <path>] [--no-confirm] [--explain] [--dry-run] [settings]

  nixup receipt set <path>
  nixup receipt show
  nixup receipt clear

Settings (also read from NIXUP_* environment variables):
  --daemon-user-count <n>        --build-group-name <name>     --build-group-id <gid>
  --build-user-prefix <prefix>   --build-user-id-base <uid>    --package-url <url>
  --extra-conf <line>            --no-modify-profile           --force
  --ssl-cert-file <path>         --build-user-concurrency sequential|concurrent
  --init-system systemd|none     --root <dir>
`
  process.stdout.write(msg.trimStart())
  process.stdout.write('\n')
}

async function buildPlan(args: Argv, logger: Logger): Promise<InstallPlan> {
  const planner = parsePlannerFlag(args)
  const settings = resolveSettings({ flags: parseSettingsFlags(args) })
  const { result, plan: built } = await plan(settings, { planner, logger })
  if (!built) {
    reportFailure(result)
    die('Planning failed')
  }
  return built
}

async function runPlan(args: Argv): Promise<number> {
  const flags = parseRunFlags(args)
  const out = popFlagValue(args, ['--out'])
  const logger = mkLogger(flags)
  const built = await buildPlan(args, logger)
  rejectLeftovers(args)
  if (out) {
    await saveReceipt(out, built)
    writeOut(path.resolve(out))
  } else {
    writeOut(JSON.stringify(built, null, 2))
  }
  return 0
}

async function runInstall(args: Argv): Promise<number> {
  const flags = parseRunFlags(args)
  const planFile = popFlagValue(args, ['--plan'])
  const receiptPath = await resolveReceiptPath(args)
  const logger = mkLogger(flags)
  const requested = planFile ? await loadReceipt(planFile) : await buildPlan(args, logger)
  rejectLeftovers(args)

  let target = requested
  const existing = await loadReceiptIfExists(receiptPath)
  if (existing) {
    existing.checkCompatible(requested.planner)
    if (existing.isComplete()) {
      writeOut(`Nix is already installed according to \`${receiptPath}\`; nothing to do.`)
      return 0
    }
    logger.info(`Resuming the install recorded in \`${receiptPath}\``)
    target = existing
  }

  writeOut(target.describeInstall(flags.explain))
  if (!flags.noConfirm && !flags.dryRun && !await confirm('Proceed with the installation?')) {
    writeOut("Okay, didn't do anything!")
    return 0
  }

  const interrupt = interruptSignal()
  try {
    const { result } = await install(target, {
      receiptPath,
      logger,
      dryRun: flags.dryRun,
      explain: flags.explain,
      signal: interrupt.signal,
    })
    writeResult(result)
    if (result.ok) return 0

    reportFailure(result)
    if (flags.dryRun) return 1
    const revert = flags.noConfirm || await confirm('Installation failed. Revert the changes that were made?')
    if (!revert) return 1
    const { result: reverted } = await uninstall(receiptPath, { logger })
    writeResult(reverted)
    if (!reverted.ok) reportFailure(reverted)
    return 1
  } finally {
    interrupt.dispose()
  }
}

async function runUninstall(args: Argv): Promise<number> {
  const flags = parseRunFlags(args)
  const receiptPath = await resolveReceiptPath(args)
  const plannerFlagGiven = args.includes('--planner')
  const planner = plannerFlagGiven ? parsePlannerFlag(args) : undefined
  const settingsFlags = parseSettingsFlags(args)
  rejectLeftovers(args)

  const receipt = await loadReceipt(receiptPath)
  // Settings on the command line state what the receipt is expected to have been made with.
  let expect: PlannerRecord | undefined
  if (planner || Object.keys(settingsFlags).length) {
    const settings: CommonSettings = resolveSettings({ flags: settingsFlags })
    expect = { planner: planner ?? receipt.planner.planner, settings }
    receipt.checkCompatible(expect)
  }

  writeOut(receipt.describeUninstall(flags.explain))
  if (!flags.noConfirm && !flags.dryRun && !await confirm('Proceed with the uninstallation?')) {
    writeOut("Okay, didn't do anything!")
    return 0
  }

  const logger = mkLogger(flags)
  const interrupt = interruptSignal()
  try {
    const { result } = await uninstall(receiptPath, {
      logger,
      expect,
      dryRun: flags.dryRun,
      explain: flags.explain,
      signal: interrupt.signal,
    })
    writeResult(result)
    if (!result.ok) reportFailure(result)
    return result.ok ? 0 : 1
  } finally {
    interrupt.dispose()
  }
}

async function runReceipt(args: Argv): Promise<number> {
  const sub = args.shift()
  if (sub === 'set') {
    const p = args.shift()
    if (!p) die('receipt set requires a path')
    writeOut(await setDefaultReceiptPath(p))
    return 0
  }
  if (sub === 'show') {
    const p = await getDefaultReceiptPath()
    if (!p) die('No default receipt set. Run `nixup receipt set <path>`.', 2)
    writeOut(p)
    return 0
  }
  if (sub === 'clear') {
    await clearDefaultReceiptPath()
    return 0
  }
  die('Unknown receipt subcommand. Expected: set|show|clear')
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const args = [...argv]
    if (args.length === 0 || hasFlag(args, ['-h', '--help'])) {
      printHelp()
      return 0
    }

    const cmd = args.shift()
    switch (cmd) {
      case 'plan': return await runPlan(args)
      case 'install': return await runInstall(args)
      case 'uninstall': return await runUninstall(args)
      case 'receipt': return await runReceipt(args)
    }
    die(`Unknown command: ${cmd}`)
  } catch (e) {
    if (e instanceof CliExit) {
      const msg = e.message || 'Command failed'
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      return e.exitCode
    }
    if (e instanceof PlanError || e instanceof ConfigFileError) {
      process.stderr.write(`error: ${e.message}\n`)
      return 1
    }
    if (e instanceof ZodError) {
      process.stderr.write(`Invalid settings: ${e.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}\n`)
      return 1
    }
    throw e
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const msg = err instanceof Error && err.stack ? err.stack : String(err)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
