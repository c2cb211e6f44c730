/**
 * Cluster backups
 *
 * Layout under the backup root:
 *   <version>-<cluster>/<timestamp>.dump/     pg_dump per database
 *   <version>-<cluster>/<timestamp>.backup/   pg_basebackup tarballs
 *   <version>-<cluster>/wal/                  archived WAL segments
 * Every backup directory has a `status` file of "key: value" lines.
 */

import { createReadStream, createWriteStream } from 'fs'
import { chown, mkdir, readFile, readdir, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { pipeline } from 'stream/promises'
import { createGzip } from 'zlib'
import type { BackupEntry, BackupKind, BackupStatus, ClusterInfo, Owner } from '../types'
import type { ClusterContext } from './context'
import {
  ErrorCodes,
  isErrnoException,
  isMissingFileError,
  logDebug,
  logInfo,
  logWarning,
  usageError,
  validationError,
} from './error-handler'
import { ensureDirectory } from './fs-error-utils'
import { ownerOf, psqlTarget, type ProcessManager } from './process-manager'

export type BackupAction =
  | 'createdirectory'
  | 'basebackup'
  | 'dump'
  | 'expiredumps'
  | 'expirebasebackups'
  | 'receivewal'
  | 'compresswal'
  | 'archivecleanup'
  | 'list'

export const BACKUP_ACTIONS: readonly BackupAction[] = [
  'createdirectory',
  'basebackup',
  'dump',
  'expiredumps',
  'expirebasebackups',
  'receivewal',
  'compresswal',
  'archivecleanup',
  'list',
]

export const COMPRESS_LOCK = '.compresswal.lock'

// completed segments only; .partial and .history files stay as they are
const WAL_SEGMENT_PATTERN = /^[0-9A-F]{24}$/

const BACKUP_DIR_MODE = 0o750

export function isBackupAction(value: string): value is BackupAction {
  return (BACKUP_ACTIONS as readonly string[]).includes(value)
}

/**
 * Timestamp used as backup directory name, sortable as text
 */
export function generateBackupTimestamp(date = new Date()): string {
  return date.toISOString().replace(/:/g, '').split('.')[0]
}

export function parseBackupName(entry: string): { timestamp: string; kind: BackupKind } | null {
  const match = /^(.+)\.(dump|backup)$/.exec(entry)
  if (!match) return null
  return { timestamp: match[1], kind: match[2] === 'dump' ? 'dump' : 'backup' }
}

export function formatStatus(status: BackupStatus): string {
  const lines = [`type: ${status.type}`, `start: ${status.start}`]
  if (status.end) lines.push(`end: ${status.end}`)
  if (status.duration) lines.push(`duration: ${status.duration}`)
  lines.push(`status: ${status.status}`)
  return `${lines.join('\n')}\n`
}

export function parseStatus(text: string): BackupStatus | null {
  const fields: Record<string, string> = {}
  for (const line of text.split('\n')) {
    const match = /^(\w+):\s*(.*)$/.exec(line)
    if (match) fields[match[1]] = match[2]
  }
  const { type, start, status } = fields
  if ((type !== 'dump' && type !== 'backup') || !start) return null
  if (status !== 'running' && status !== 'ok' && status !== 'failed') return null
  return { type, start, end: fields.end, duration: fields.duration, status }
}

/**
 * Database names become file names; keep "/" and friends out
 */
export function dumpFileName(database: string): string {
  return `${encodeURIComponent(database)}.dump`
}

export function databaseFromDumpFile(file: string): string | null {
  if (!file.endsWith('.dump')) return null
  return decodeURIComponent(file.slice(0, -'.dump'.length))
}

export async function readBackupStatus(dir: string): Promise<BackupStatus | null> {
  try {
    return parseStatus(await readFile(join(dir, 'status'), 'utf8'))
  } catch (error) {
    if (isMissingFileError(error)) return null
    throw error
  }
}

export class BackupManager {
  constructor(
    private readonly ctx: ClusterContext,
    private readonly processes: ProcessManager,
  ) {}

  private async giveToOwner(path: string, owner: Owner): Promise<void> {
    if (this.ctx.host.identity.isPrivileged()) await chown(path, owner.uid, owner.gid)
  }

  backupDir(info: ClusterInfo): string {
    return this.ctx.paths.backupClusterPath(info.version, info.name)
  }

  walDir(info: ClusterInfo): string {
    return join(this.backupDir(info), 'wal')
  }

  private requireRunning(info: ClusterInfo): void {
    if (!info.running) {
      throw validationError(
        ErrorCodes.CLUSTER_NOT_RUNNING,
        `cluster ${info.version}/${info.name} is not running`,
        { version: info.version, cluster: info.name },
      )
    }
  }

  /**
   * Create the cluster's backup directory and its wal/ subdirectory
   */
  async createDirectory(info: ClusterInfo): Promise<string> {
    const owner = ownerOf(info)
    const privileged = this.ctx.host.identity.isPrivileged()
    const dir = this.backupDir(info)
    await ensureDirectory(dir, { owner: privileged ? owner : null, mode: BACKUP_DIR_MODE })
    await ensureDirectory(this.walDir(info), {
      owner: privileged ? owner : null,
      mode: BACKUP_DIR_MODE,
    })
    return dir
  }

  private async writeStatus(dir: string, status: BackupStatus, owner: Owner): Promise<void> {
    const path = join(dir, 'status')
    await writeFile(path, formatStatus(status))
    await this.giveToOwner(path, owner)
  }

  /**
   * Run `work` in a fresh backup directory, recording its outcome in the
   * status file
   */
  private async track(
    info: ClusterInfo,
    kind: BackupKind,
    work: (dir: string) => Promise<void>,
  ): Promise<string> {
    const owner = ownerOf(info)
    await this.createDirectory(info)
    const started = new Date()
    const dir = join(this.backupDir(info), `${generateBackupTimestamp(started)}.${kind}`)
    await mkdir(dir, { mode: BACKUP_DIR_MODE })
    await this.giveToOwner(dir, owner)

    const status: BackupStatus = { type: kind, start: started.toISOString(), status: 'running' }
    await this.writeStatus(dir, status, owner)
    logInfo(`Backing up ${info.version}/${info.name} to ${dir}`, { kind })

    try {
      await work(dir)
      status.status = 'ok'
    } catch (error) {
      status.status = 'failed'
      throw error
    } finally {
      const ended = new Date()
      status.end = ended.toISOString()
      status.duration = `${Math.round((ended.getTime() - started.getTime()) / 1000)}s`
      await this.writeStatus(dir, status, owner)
    }
    return dir
  }

  private async archiveConfig(info: ClusterInfo, dir: string): Promise<void> {
    await this.processes.runTool(
      'tar',
      ['-czf', join(dir, 'config.tar.gz'), '-C', info.configDir, '.'],
      this.processes.asOwner(ownerOf(info)),
    )
  }

  /**
   * Logical backup: configuration, global objects, one pg_dump per database
   */
  async dump(info: ClusterInfo): Promise<string> {
    this.requireRunning(info)
    const target = psqlTarget(info)
    const asOwner = this.processes.asOwner(target.owner)

    return this.track(info, 'dump', async (dir) => {
      await this.archiveConfig(info, dir)
      const { stdout } = await this.processes.run(
        'pg_dumpall',
        info.version,
        this.processes.psqlArgs(target, '--globals-only', '--quote-all-identifiers'),
        asOwner,
      )
      const globals = join(dir, 'globals.sql')
      await writeFile(globals, stdout)
      await this.giveToOwner(globals, target.owner)

      for (const database of await this.processes.listDatabases(target)) {
        if (database === 'template0') continue
        logDebug(`Dumping database ${database}`)
        await this.processes.run(
          'pg_dump',
          info.version,
          this.processes.psqlArgs(
            target,
            '-Fc',
            '--quote-all-identifiers',
            '-f',
            join(dir, dumpFileName(database)),
            database,
          ),
          asOwner,
        )
      }
    })
  }

  /**
   * Physical backup with pg_basebackup; backup_label is kept beside the
   * tarballs for archivecleanup
   */
  async basebackup(info: ClusterInfo): Promise<string> {
    this.requireRunning(info)
    const target = psqlTarget(info)
    const asOwner = this.processes.asOwner(target.owner)

    return this.track(info, 'backup', async (dir) => {
      await this.archiveConfig(info, dir)
      await this.processes.run(
        'pg_basebackup',
        info.version,
        this.processes.psqlArgs(target, '-D', dir, '-Ft', '-z', '--wal-method=stream'),
        asOwner,
      )
      await this.processes.runTool(
        'tar',
        ['-xzf', join(dir, 'base.tar.gz'), '-C', dir, 'backup_label'],
        asOwner,
      )
    })
  }

  async list(info: ClusterInfo): Promise<BackupEntry[]> {
    const dir = this.backupDir(info)
    let entries: string[]
    try {
      entries = await readdir(dir)
    } catch (error) {
      if (isMissingFileError(error)) return []
      throw error
    }
    const result: BackupEntry[] = []
    for (const entry of entries.sort()) {
      const parsed = parseBackupName(entry)
      if (!parsed) continue
      const path = join(dir, entry)
      result.push({ path, ...parsed, status: await readBackupStatus(path) })
    }
    return result
  }

  /**
   * Remove all but the newest `keep` backups of one kind; returns the
   * removed paths
   */
  async expire(info: ClusterInfo, kind: BackupKind, keep: number): Promise<string[]> {
    if (!Number.isInteger(keep) || keep < 0) {
      throw usageError(`invalid number of backups to keep: ${keep}`)
    }
    const backups = (await this.list(info)).filter((entry) => entry.kind === kind)
    const expired = backups.slice(0, Math.max(0, backups.length - keep))
    for (const entry of expired) {
      logInfo(`Removing ${entry.path}`)
      await rm(entry.path, { recursive: true, force: true })
    }
    return expired.map((entry) => entry.path)
  }

  /**
   * Stream WAL into wal/ until pg_receivewal is stopped
   */
  async receiveWal(info: ClusterInfo): Promise<void> {
    this.requireRunning(info)
    await this.createDirectory(info)
    const target = psqlTarget(info)
    await this.processes.run(
      'pg_receivewal',
      info.version,
      this.processes.psqlArgs(target, '-D', this.walDir(info)),
      this.processes.asOwner(target.owner),
    )
  }

  /**
   * Take the compresswal lock, replacing one whose holder has died.
   * Returns false while a live process holds it.
   */
  private async acquireCompressLock(lockPath: string): Promise<boolean> {
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        await writeFile(lockPath, String(process.pid), { flag: 'wx' })
        return true
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') throw error
      }

      let holder: number
      try {
        holder = Number.parseInt(await readFile(lockPath, 'utf8'), 10)
      } catch (error) {
        // released between our attempts
        if (isMissingFileError(error)) continue
        throw error
      }
      if (Number.isInteger(holder) && holder > 0 && (await this.ctx.host.processes.commandLine(holder))) {
        logWarning(`${lockPath} is held by process ${holder}, another compresswal run is in progress`)
        return false
      }
      logWarning(`removing stale ${lockPath} left by process ${holder}`)
      await rm(lockPath, { force: true })
    }
    logWarning(`could not take ${lockPath}, another compresswal run is starting`)
    return false
  }

  /**
   * Gzip completed WAL segments. Returns how many were compressed; 0 when
   * another run holds the lock.
   */
  async compressWal(info: ClusterInfo): Promise<number> {
    const owner = ownerOf(info)
    const walDir = this.walDir(info)
    const lockPath = join(walDir, COMPRESS_LOCK)
    if (!(await this.acquireCompressLock(lockPath))) return 0

    try {
      let count = 0
      for (const entry of (await readdir(walDir)).sort()) {
        if (!WAL_SEGMENT_PATTERN.test(entry)) continue
        const path = join(walDir, entry)
        const target = `${path}.gz`
        // the segment goes only once its .gz is complete, so any .gz beside it is unfinished
        try {
          await pipeline(createReadStream(path), createGzip(), createWriteStream(target))
        } catch (error) {
          await rm(target, { force: true })
          throw error
        }
        await this.giveToOwner(target, owner)
        await rm(path)
        count++
      }
      logDebug(`Compressed ${count} WAL segments in ${walDir}`)
      return count
    } finally {
      await rm(lockPath, { force: true })
    }
  }

  /**
   * First WAL segment the oldest complete base backup needs
   */
  async oldestRequiredSegment(info: ClusterInfo): Promise<string | null> {
    for (const entry of await this.list(info)) {
      if (entry.kind !== 'backup' || entry.status?.status !== 'ok') continue
      let label: string
      try {
        label = await readFile(join(entry.path, 'backup_label'), 'utf8')
      } catch (error) {
        if (isMissingFileError(error)) continue
        throw error
      }
      const match = /^START WAL LOCATION: .*\(file ([0-9A-F]{24})\)/m.exec(label)
      if (match) return match[1]
    }
    return null
  }

  /**
   * Remove archived WAL older than the oldest base backup, plain and
   * compressed; returns the cut-off segment
   */
  async archiveCleanup(info: ClusterInfo): Promise<string | null> {
    const segment = await this.oldestRequiredSegment(info)
    if (!segment) {
      logWarning(`no complete base backup of ${info.version}/${info.name}, keeping all WAL`)
      return null
    }
    const asOwner = this.processes.asOwner(ownerOf(info))
    const walDir = this.walDir(info)
    await this.processes.run('pg_archivecleanup', info.version, [walDir, segment], asOwner)
    await this.processes.run('pg_archivecleanup', info.version, ['-x', '.gz', walDir, segment], asOwner)
    return segment
  }
}
