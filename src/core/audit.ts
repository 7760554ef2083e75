import fs from 'fs-extra'
import path from 'path'

import type { CommonOptions, Result } from '../types.js'

export function defaultAuditLogPath(receiptPath: string | undefined, opts?: CommonOptions): string | undefined {
  if (opts?.auditLogPath) return opts.auditLogPath
  return receiptPath ? `${path.resolve(receiptPath)}.log.jsonl` : undefined
}

export async function appendAudit(logPath: string, result: Result): Promise<void> {
  await fs.ensureDir(path.dirname(logPath))
  const { planText: _planText, ...line } = result
  await fs.appendFile(logPath, JSON.stringify(line) + '\n', 'utf8')
}

/**
 * Best effort: a failure to write the audit line becomes a warning on the result.
 */
export async function tryAppendAudit(result: Result, opts?: CommonOptions): Promise<Result> {
  const logPath = defaultAuditLogPath(result.receiptPath, opts)
  if (!logPath || opts?.dryRun) return result
  try {
    await appendAudit(logPath, result)
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e)
    result.warnings.push(`Failed to write audit log: ${msg}`)
  }
  return result
}
