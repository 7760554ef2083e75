import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { z } from 'zod'

const CONFIG_FILE = path.join('nixup', 'config.json')

// Resolved when set, so the default does not depend on where nixup is later run from.
const ReceiptPathSchema = z.string().min(1).refine(p => path.isAbsolute(p), { message: 'must be an absolute path' })

const NixupConfigSchema = z.object({
  receiptPath: ReceiptPathSchema.optional(),
}).strict()

export type NixupConfig = z.infer<typeof NixupConfigSchema>

/**
 * The config file exists but does not hold a usable config.
 */
export class ConfigFileError extends Error {
  constructor(readonly configPath: string, readonly issues: string[]) {
    super(`Invalid config \`${configPath}\`: ${issues.join('; ')}. Fix it or run \`nixup receipt clear\`.`)
    this.name = 'ConfigFileError'
  }
}

export interface ConfigEnv {
  env?: NodeJS.ProcessEnv
  /**
   * For tests or embedding, override home dir (default: os.homedir()).
   */
  homeDir?: string
}

export function getGlobalConfigPath(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  const base = env.XDG_CONFIG_HOME || path.join(opts.homeDir ?? os.homedir(), '.config')
  return path.join(base, CONFIG_FILE)
}

export async function readGlobalConfig(opts: ConfigEnv = {}): Promise<NixupConfig> {
  const p = getGlobalConfigPath(opts)
  if (!await fs.pathExists(p)) return {}
  let raw: unknown
  try {
    raw = await fs.readJson(p)
  } catch (e) {
    throw new ConfigFileError(p, [e instanceof Error ? e.message : String(e)])
  }
  const parsed = NixupConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigFileError(p, parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`))
  }
  return parsed.data
}

export async function writeGlobalConfig(config: NixupConfig, opts: ConfigEnv = {}): Promise<void> {
  const p = getGlobalConfigPath(opts)
  await fs.ensureDir(path.dirname(p))
  await fs.writeJson(p, NixupConfigSchema.parse(config), { spaces: 2 })
}

/**
 * Store `receiptPath`, resolved against the current directory, as the default receipt.
 */
export async function setDefaultReceiptPath(receiptPath: string, opts: ConfigEnv = {}): Promise<string> {
  const abs = path.resolve(receiptPath)
  await writeGlobalConfig({ receiptPath: abs }, opts)
  return abs
}

export async function getDefaultReceiptPath(opts: ConfigEnv = {}): Promise<string | undefined> {
  return (await readGlobalConfig(opts)).receiptPath
}

export async function clearDefaultReceiptPath(opts: ConfigEnv = {}): Promise<void> {
  await fs.remove(getGlobalConfigPath(opts))
}
