import fs from 'fs-extra'

import { executeCommand, which } from './command.js'
import { CommandOutputError } from './errors.js'

export interface UserEntry {
  name: string
  uid: number
  gid: number
}

export interface GroupEntry {
  name: string
  gid: number
}

/**
 * Read-only view of the host used while planning. Tests substitute their own.
 */
export interface HostProbe {
  pathExists(p: string): Promise<boolean>
  stat(p: string): Promise<fs.Stats>
  readFile(p: string): Promise<string>
  readSymlink(p: string): Promise<string | undefined>
  lookupUser(name: string): Promise<UserEntry | undefined>
  lookupGroup(name: string): Promise<GroupEntry | undefined>
  commandExists(command: string): Promise<boolean>
}

// `getent` exits 2 when the key is not in the database.
const GETENT_NOT_FOUND = 2

async function getent(database: 'passwd' | 'group', key: string): Promise<string[] | undefined> {
  try {
    const { stdout } = await executeCommand('getent', [database, key])
    const line = stdout.split('\n').find(l => l.trim().length > 0)
    return line?.split(':')
  } catch (e) {
    if (e instanceof CommandOutputError && e.status === GETENT_NOT_FOUND) return undefined
    throw e
  }
}

export async function lookupUser(name: string): Promise<UserEntry | undefined> {
  const fields = await getent('passwd', name)
  if (!fields) return undefined
  return { name: fields[0], uid: Number(fields[2]), gid: Number(fields[3]) }
}

export async function lookupGroup(name: string): Promise<GroupEntry | undefined> {
  const fields = await getent('group', name)
  if (!fields) return undefined
  return { name: fields[0], gid: Number(fields[2]) }
}

/**
 * Target of the symlink at `p`, or undefined when nothing is there or it is not a symlink.
 */
export async function readSymlink(p: string): Promise<string | undefined> {
  let st: fs.Stats
  try {
    st = await fs.lstat(p)
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return undefined
    throw e
  }
  return st.isSymbolicLink() ? fs.readlink(p) : undefined
}

export const nodeProbe: HostProbe = {
  pathExists: (p) => fs.pathExists(p),
  stat: (p) => fs.stat(p),
  readFile: (p) => fs.readFile(p, 'utf8'),
  readSymlink,
  lookupUser,
  lookupGroup,
  commandExists: async (command) => (await which(command)) !== undefined,
}
