import { spawn } from 'node:child_process'
import fs from 'fs-extra'
import path from 'path'

import type { Logger } from '../types.js'
import { ActionError, CommandOutputError } from './errors.js'

export interface CommandOptions {
  /**
   * CA bundle handed to the child as `NIX_SSL_CERT_FILE`. Only this child's env is touched.
   */
  sslCertFile?: string
  env?: Record<string, string>
  stdin?: string
  logger?: Logger
}

export interface CommandOutput {
  stdout: string
  stderr: string
}

export function displayCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(a => (/[\s'"]/.test(a) ? JSON.stringify(a) : a)).join(' ')
}

export function commandEnv(opts: Pick<CommandOptions, 'sslCertFile' | 'env'>): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env, ...opts.env }
  if (opts.sslCertFile) env.NIX_SSL_CERT_FILE = opts.sslCertFile
  return env
}

/**
 * Run a command to completion. A spawn failure is a `command` error, a non-zero exit a
 * `CommandOutputError` carrying the captured output.
 */
export function executeCommand(command: string, args: readonly string[], opts: CommandOptions = {}): Promise<CommandOutput> {
  const shown = displayCommand(command, args)
  opts.logger?.debug(`Running: ${shown}`)
  return new Promise<CommandOutput>((resolve, reject) => {
    const child = spawn(command, args, {
      env: commandEnv(opts),
      stdio: [opts.stdin === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
    })
    let stdout = ''
    let stderr = ''
    child.stdout?.setEncoding('utf8')
    child.stderr?.setEncoding('utf8')
    child.stdout?.on('data', (chunk: string) => { stdout += chunk })
    child.stderr?.on('data', (chunk: string) => { stderr += chunk })
    child.on('error', (e) => {
      reject(new ActionError('command', `Failed to execute command \`${shown}\`: ${e.message}`, { cause: e }))
    })
    child.on('close', (code) => {
      if (code === 0) resolve({ stdout, stderr })
      else reject(new CommandOutputError(shown, code, stdout, stderr))
    })
    if (opts.stdin !== undefined) {
      child.stdin?.end(opts.stdin)
    }
  })
}

/**
 * Look a command up on PATH.
 */
export async function which(command: string, envPath: string = process.env.PATH ?? ''): Promise<string | undefined> {
  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue
    const candidate = path.join(dir, command)
    if (await fs.pathExists(candidate)) return candidate
  }
  return undefined
}
