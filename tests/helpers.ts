import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import type { Action, ActionContext, ActionDescription } from '../src/core/action.js'
import { describe } from '../src/core/action.js'
import { executeChildren, revertChildren } from '../src/core/compose.js'
import type { FanOut } from '../src/core/compose.js'
import { ActionError } from '../src/core/errors.js'
import type { HostProbe } from '../src/core/fs.js'
import { noopLogger } from '../src/core/log.js'
import type { StatefulAction } from '../src/core/stateful.js'

export function mkTmp(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'nixup-test-'))
}

export function mkCtx(signal: AbortSignal = new AbortController().signal): ActionContext {
  return { logger: noopLogger(), signal }
}

/**
 * A host with nothing on it, where every command is available.
 */
export function fakeProbe(overrides: Partial<HostProbe> = {}): HostProbe {
  return {
    pathExists: async () => false,
    stat: async (p) => { throw new Error(`unexpected stat of ${p}`) },
    readFile: async (p) => { throw new Error(`unexpected read of ${p}`) },
    readSymlink: async () => undefined,
    lookupUser: async () => undefined,
    lookupGroup: async () => undefined,
    commandExists: async () => true,
    ...overrides,
  }
}

export interface FakeLeafOptions {
  failExecute?: boolean
  failRevert?: boolean
  onExecute?: (ctx: ActionContext) => void | Promise<void>
}

/**
 * Records `execute:<name>` / `revert:<name>` into `log`.
 */
export class FakeLeaf implements Action {
  constructor(
    readonly tag: string,
    private readonly log: string[],
    private readonly opts: FakeLeafOptions = {},
  ) {}

  tracingSynopsis(): string {
    return `Fake ${this.tag}`
  }

  tracingFields(): Record<string, unknown> {
    return {}
  }

  executeDescription(): ActionDescription[] {
    return [describe(`Do ${this.tag}`, [`Because ${this.tag}`])]
  }

  revertDescription(): ActionDescription[] {
    return [describe(`Undo ${this.tag}`)]
  }

  async execute(ctx: ActionContext): Promise<void> {
    this.log.push(`execute:${this.tag}`)
    await this.opts.onExecute?.(ctx)
    if (this.opts.failExecute) throw new ActionError('custom', `${this.tag} failed`)
  }

  async revert(_ctx: ActionContext): Promise<void> {
    this.log.push(`revert:${this.tag}`)
    if (this.opts.failRevert) throw new ActionError('custom', `${this.tag} could not be undone`)
  }

  toJSON(): Record<string, unknown> {
    return {}
  }
}

export class FakeComposite implements Action {
  constructor(
    readonly tag: string,
    private readonly members: StatefulAction[],
    private readonly fanOut: FanOut = 'sequential',
  ) {}

  children(): readonly StatefulAction[] {
    return this.members
  }

  tracingSynopsis(): string {
    return `Fake composite ${this.tag}`
  }

  tracingFields(): Record<string, unknown> {
    return {}
  }

  executeDescription(): ActionDescription[] {
    return this.members.flatMap(m => m.describeExecute())
  }

  revertDescription(): ActionDescription[] {
    return this.members.flatMap(m => m.describeRevert())
  }

  execute(ctx: ActionContext): Promise<void> {
    return executeChildren(this.fanOut, this.members, ctx)
  }

  revert(ctx: ActionContext): Promise<void> {
    return revertChildren(this.fanOut, this.members, ctx)
  }

  toJSON(): Record<string, unknown> {
    return { members: this.members.map(m => m.toJSON()) }
  }
}

/**
 * The rejection of `p`, failing the test if it resolves.
 */
export async function rejection(p: Promise<unknown>): Promise<unknown> {
  try {
    await p
  } catch (e) {
    return e
  }
  throw new Error('expected a rejection')
}

export interface FakeCommands {
  /**
   * Scratch directory of the fake commands; their scripts see it as `$dir`.
   */
  dir: string
  /**
   * One line per call, `<command> <args>`, in call order.
   */
  calls(): Promise<string[]>
  restore(): void
}

/**
 * Put shell scripts named after commands first on PATH. Each records its call, then runs its body.
 */
export async function fakeCommands(scripts: Record<string, string>): Promise<FakeCommands> {
  const dir = await mkTmp()
  const bin = path.join(dir, 'bin')
  const log = path.join(dir, 'calls.log')
  await fs.ensureDir(bin)
  await fs.writeFile(log, '')
  for (const [name, body] of Object.entries(scripts)) {
    const script = ['#!/bin/sh', `dir='${dir}'`, `echo "${name} $*" >> "$dir/calls.log"`, body, ''].join('\n')
    await fs.writeFile(path.join(bin, name), script, { mode: 0o755 })
  }
  const originalPath = process.env.PATH
  process.env.PATH = `${bin}${path.delimiter}${originalPath ?? ''}`
  return {
    dir,
    calls: async () => (await fs.readFile(log, 'utf8')).split('\n').filter(l => l.length > 0),
    restore: () => {
      if (originalPath === undefined) delete process.env.PATH
      else process.env.PATH = originalPath
    },
  }
}
