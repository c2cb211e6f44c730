/**
 * Platform Service
 *
 * Host capabilities the cluster code needs from the operating system:
 * the account database, switching the effective identity to a cluster
 * owner, and looking at running processes. Each one is an interface so
 * tests can inject fakes.
 */

import { readFile } from 'fs/promises'
import { join } from 'path'
import type { Owner } from '../types'
import { isMissingFileError, logDebug } from './error-handler'

// =============================================================================
// Types
// =============================================================================

export type Account = {
  name: string
  uid: number
  gid: number
  home: string
}

export type Group = {
  name: string
  gid: number
  members: string[]
}

export interface AccountDatabase {
  userByName(name: string): Promise<Account | null>
  userByUid(uid: number): Promise<Account | null>
  groupByName(name: string): Promise<Group | null>
  groupByGid(gid: number): Promise<Group | null>
}

export interface IdentitySwitcher {
  /**
   * True when the process may act as other accounts
   */
  isPrivileged(): boolean
  /**
   * Run `fn` with the effective uid/gid of `owner`; the previous identity
   * is restored when it settles, whichever way
   */
  withIdentity<T>(owner: Owner, fn: () => Promise<T>): Promise<T>
}

export interface ProcessInspector {
  /**
   * argv of a live process, or null when there is no such process
   */
  commandLine(pid: number): Promise<string[] | null>
}

// =============================================================================
// Account database
// =============================================================================

function parsePasswd(text: string): Account[] {
  const accounts: Account[] = []
  for (const line of text.split('\n')) {
    if (!line || line.startsWith('#')) continue
    const fields = line.split(':')
    if (fields.length < 7) continue
    const uid = Number(fields[2])
    const gid = Number(fields[3])
    if (!Number.isInteger(uid) || !Number.isInteger(gid)) continue
    accounts.push({ name: fields[0], uid, gid, home: fields[5] })
  }
  return accounts
}

function parseGroup(text: string): Group[] {
  const groups: Group[] = []
  for (const line of text.split('\n')) {
    if (!line || line.startsWith('#')) continue
    const fields = line.split(':')
    if (fields.length < 4) continue
    const gid = Number(fields[2])
    if (!Number.isInteger(gid)) continue
    groups.push({
      name: fields[0],
      gid,
      members: fields[3] ? fields[3].split(',') : [],
    })
  }
  return groups
}

async function readOptional(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFileError(error)) return ''
    throw error
  }
}

/**
 * Reads /etc/passwd and /etc/group (or files in another root) on first use
 */
export class FileAccountDatabase implements AccountDatabase {
  private accounts: Account[] | null = null
  private groups: Group[] | null = null

  constructor(private readonly etcDir = '/etc') {}

  private async loadAccounts(): Promise<Account[]> {
    if (!this.accounts) {
      this.accounts = parsePasswd(await readOptional(join(this.etcDir, 'passwd')))
    }
    return this.accounts
  }

  private async loadGroups(): Promise<Group[]> {
    if (!this.groups) {
      this.groups = parseGroup(await readOptional(join(this.etcDir, 'group')))
    }
    return this.groups
  }

  async userByName(name: string): Promise<Account | null> {
    return (await this.loadAccounts()).find((a) => a.name === name) ?? null
  }

  async userByUid(uid: number): Promise<Account | null> {
    return (await this.loadAccounts()).find((a) => a.uid === uid) ?? null
  }

  async groupByName(name: string): Promise<Group | null> {
    return (await this.loadGroups()).find((g) => g.name === name) ?? null
  }

  async groupByGid(gid: number): Promise<Group | null> {
    return (await this.loadGroups()).find((g) => g.gid === gid) ?? null
  }
}

// =============================================================================
// Identity switching
// =============================================================================

export function currentUid(): number {
  return process.geteuid ? process.geteuid() : -1
}

export class ProcessIdentitySwitcher implements IdentitySwitcher {
  isPrivileged(): boolean {
    return currentUid() === 0
  }

  async withIdentity<T>(owner: Owner, fn: () => Promise<T>): Promise<T> {
    const { seteuid, setegid, getegid } = process
    if (!this.isPrivileged() || !seteuid || !setegid || !getegid) {
      return fn()
    }

    const previousGid = getegid()
    setegid(owner.gid)
    seteuid(owner.uid)
    logDebug('Switched effective identity', { ...owner })
    try {
      return await fn()
    } finally {
      seteuid(0)
      setegid(previousGid)
      logDebug('Restored effective identity', { uid: 0, gid: previousGid })
    }
  }
}

// =============================================================================
// Processes
// =============================================================================

export class ProcFsInspector implements ProcessInspector {
  constructor(private readonly procRoot = '/proc') {}

  async commandLine(pid: number): Promise<string[] | null> {
    try {
      const raw = await readFile(join(this.procRoot, String(pid), 'cmdline'), 'utf8')
      return raw.split('\0').filter((arg) => arg.length > 0)
    } catch (error) {
      if (isMissingFileError(error)) return null
      throw error
    }
  }
}
