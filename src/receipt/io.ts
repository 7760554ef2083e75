import fs from 'fs-extra'
import path from 'path'

import { InstallPlan, PlanError } from '../core/plan.js'

async function readJson(abs: string): Promise<unknown> {
  try {
    return await fs.readJson(abs)
  } catch (e) {
    throw new PlanError('receipt_invalid', `Reading receipt \`${abs}\`: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
  }
}

export async function loadReceipt(receiptPath: string): Promise<InstallPlan> {
  const abs = path.resolve(receiptPath)
  if (!await fs.pathExists(abs)) {
    throw new PlanError('receipt_invalid', `Receipt not found: ${abs}`)
  }
  return InstallPlan.fromJSON(await readJson(abs))
}

/**
 * The receipt at `receiptPath`, or `undefined` when there is none. A receipt that exists
 * but can not be read is still an error.
 */
export async function loadReceiptIfExists(receiptPath: string): Promise<InstallPlan | undefined> {
  const abs = path.resolve(receiptPath)
  if (!await fs.pathExists(abs)) return undefined
  return InstallPlan.fromJSON(await readJson(abs))
}

export interface SaveReceiptOptions {
  spaces?: number
}

/**
 * Write through a temp file beside the receipt so a reader never sees half a document.
 */
export async function saveReceipt(receiptPath: string, plan: InstallPlan, opts: SaveReceiptOptions = {}): Promise<void> {
  const abs = path.resolve(receiptPath)
  await fs.ensureDir(path.dirname(abs))
  const spaces = opts.spaces ?? 2
  const content = JSON.stringify(plan, null, spaces) + '\n'
  const tmp = `${abs}.tmp.${Date.now()}.${Math.random().toString(16).slice(2)}`
  await fs.writeFile(tmp, content, 'utf8')
  await fs.rename(tmp, abs)
}

export async function removeReceipt(receiptPath: string): Promise<void> {
  const abs = path.resolve(receiptPath)
  if (!await fs.pathExists(abs)) return
  await fs.remove(abs)
}
