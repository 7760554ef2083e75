import fs from 'fs-extra'
import path from 'path'

import { ActionError, IoError } from './errors.js'
import { lookupGroup, lookupUser } from './fs.js'

export interface Ownership {
  user?: string
  group?: string
  mode?: number
}

async function io<T>(operation: string, p: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run()
  } catch (e) {
    throw new IoError(operation, p, e)
  }
}

export async function resolveUid(user: string): Promise<number> {
  const entry = await lookupUser(user)
  if (!entry) throw new ActionError('no_user', `Getting user \`${user}\``)
  return entry.uid
}

export async function resolveGid(group: string): Promise<number> {
  const entry = await lookupGroup(group)
  if (!entry) throw new ActionError('no_group', `Getting group \`${group}\``)
  return entry.gid
}

/**
 * Apply owner, group and mode. Fields left out are not touched.
 */
export async function applyOwnership(p: string, own: Ownership): Promise<void> {
  if (own.user !== undefined || own.group !== undefined) {
    const uid = own.user !== undefined ? await resolveUid(own.user) : -1
    const gid = own.group !== undefined ? await resolveGid(own.group) : -1
    await io('Chowning path', p, () => fs.chown(p, uid, gid))
  }
  if (own.mode !== undefined) {
    const mode = own.mode
    await io(`Set mode \`${mode.toString(8)}\` on`, p, () => fs.chmod(p, mode))
  }
}

/**
 * Create exactly one directory level; the parent must already exist. A directory that appeared
 * since planning (created by a concurrent sibling) is accepted and given the requested ownership.
 */
export async function createDir(p: string, own: Ownership = {}): Promise<void> {
  await io('Creating directory', p, async () => {
    try {
      await fs.mkdir(p)
    } catch (e) {
      if (!isErrnoException(e) || e.code !== 'EEXIST' || !(await fs.stat(p)).isDirectory()) throw e
    }
  })
  await applyOwnership(p, own)
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e
}

export async function isEmptyDir(p: string): Promise<boolean> {
  const entries = await io('Reading directory', p, () => fs.readdir(p))
  return entries.length === 0
}

export async function readDir(p: string): Promise<string[]> {
  return io('Reading directory', p, () => fs.readdir(p))
}

export async function removeDir(p: string): Promise<void> {
  await io('Removing directory', p, () => fs.rmdir(p))
}

export async function removePath(p: string): Promise<void> {
  await io('Removing', p, () => fs.remove(p))
}

export async function readText(p: string): Promise<string> {
  return io('Reading', p, () => fs.readFile(p, 'utf8'))
}

/**
 * Write `content` through a temp file beside `p` and rename it into place.
 */
export async function writeFileAtomic(p: string, content: string, own: Ownership = {}): Promise<void> {
  const tmp = `${p}.tmp.${Date.now()}.${Math.random().toString(16).slice(2)}`
  await io('Writing', tmp, () => fs.writeFile(tmp, content, 'utf8'))
  try {
    await applyOwnership(tmp, own)
    await io('Renaming into', p, () => fs.rename(tmp, p))
  } catch (e) {
    await fs.remove(tmp)
    throw e
  }
}

export async function appendText(p: string, content: string): Promise<void> {
  await io('Appending to', p, () => fs.appendFile(p, content, 'utf8'))
}

export async function renamePath(from: string, to: string): Promise<void> {
  await io(`Rename \`${from}\` to`, to, () => fs.rename(from, to))
}

export async function ensureSymlink(source: string, target: string): Promise<void> {
  await io(`Symlinking \`${source}\` to`, target, async () => {
    await fs.ensureDir(path.dirname(target))
    await fs.symlink(source, target)
  })
}

export async function removeSymlink(p: string): Promise<void> {
  await io('Removing symlink', p, async () => {
    const st = await fs.lstat(p)
    if (!st.isSymbolicLink()) {
      throw new Error(`Refusing to remove non-symlink: ${p}`)
    }
    await fs.unlink(p)
  })
}
