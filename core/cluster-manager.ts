/**
 * Drop and rename of existing clusters
 */

import { lstat, readdir, readlink, rm, rmdir, stat } from 'fs/promises'
import { basename, dirname, join, resolve } from 'path'
import { defaults } from '../config/defaults'
import type { ClusterInfo } from '../types'
import type { ClusterControl } from './cluster-control'
import type { ClusterRegistry } from './cluster-registry'
import { editConfFile } from './conf-file'
import type { ClusterContext } from './context'
import {
  ErrorCodes,
  PgClusterError,
  assertValidClusterName,
  clusterExistsError,
  clusterNotFoundError,
  clusterRunningError,
  isErrnoException,
  isMissingFileError,
  logDebug,
  logInfo,
  logWarning,
  validationError,
} from './error-handler'
import { moveEntry, pathExists } from './fs-error-utils'

export type DropOptions = {
  // stop a running cluster instead of refusing
  stopIfRunning?: boolean
}

// settings whose values embed the cluster name
export const CLUSTER_PATH_SETTINGS = [
  'data_directory',
  'hba_file',
  'ident_file',
  'external_pid_file',
  'cluster_name',
  'stats_temp_directory',
]

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Replace `from` by `to` where it stands as a whole word
 */
export function replaceWholeWord(text: string, from: string, to: string): string {
  return text.replace(new RegExp(`(?<!\\w)${escapeRegExp(from)}(?!\\w)`, 'g'), to)
}

/**
 * Looks up the uid owning a path, or null when the path is missing
 */
export type FileOwnerLookup = (path: string) => Promise<number | null>

export async function fileOwnerUid(path: string): Promise<number | null> {
  try {
    return (await stat(path)).uid
  } catch (error) {
    if (isMissingFileError(error)) return null
    throw error
  }
}

/**
 * The log file plus logrotate's numbered and compressed siblings
 */
async function logFamily(logFile: string): Promise<string[]> {
  const dir = dirname(logFile)
  const base = basename(logFile)
  let entries: string[]
  try {
    entries = await readdir(dir)
  } catch (error) {
    if (isMissingFileError(error)) return []
    throw error
  }
  return entries
    .filter((entry) => entry === base || entry.startsWith(`${base}.`))
    .map((entry) => join(dir, entry))
}

export class ClusterManager {
  constructor(
    private readonly ctx: ClusterContext,
    private readonly registry: ClusterRegistry,
    private readonly control: ClusterControl,
    private readonly ownerUidOf: FileOwnerLookup = fileOwnerUid,
  ) {}

  /**
   * Run one cleanup action; failures become warnings
   */
  private async bestEffort(description: string, action: () => Promise<void>): Promise<void> {
    try {
      await action()
    } catch (error) {
      logWarning(`${description} failed: ${error instanceof Error ? error.message : String(error)}`)
    }
  }

  private async removeEmptyDir(path: string): Promise<void> {
    try {
      await rmdir(path)
    } catch (error) {
      if (
        isErrnoException(error) &&
        (error.code === 'ENOTEMPTY' || error.code === 'EEXIST' || error.code === 'ENOENT')
      ) {
        return
      }
      throw error
    }
  }

  /**
   * Remove the data directory, leaving tablespaces and WAL directories of
   * other owners in place
   */
  private async removeDataDirectory(info: ClusterInfo): Promise<void> {
    const { dataDir, ownerUid } = info
    if (!dataDir || !(await pathExists(dataDir))) return

    const tablespaceDir = join(dataDir, 'pg_tblspc')
    let links: string[] = []
    try {
      links = await readdir(tablespaceDir)
    } catch (error) {
      if (!isMissingFileError(error)) throw error
    }
    for (const link of links) {
      const linkPath = join(tablespaceDir, link)
      if (!(await lstat(linkPath)).isSymbolicLink()) continue
      const target = resolve(tablespaceDir, await readlink(linkPath))
      const uid = await this.ownerUidOf(target)
      if (uid === null) continue
      if (uid !== ownerUid) {
        logWarning(
          `not removing tablespace directory ${target}: owned by uid ${uid}, not by the cluster owner ${ownerUid}`,
        )
        continue
      }
      await this.bestEffort(`Removing tablespace ${target}`, async () => {
        const prefix = `PG_${info.version}_`
        for (const entry of await readdir(target)) {
          if (entry.startsWith(prefix)) {
            await rm(join(target, entry), { recursive: true, force: true })
          }
        }
      })
    }

    if (info.walDir) {
      const walDir = resolve(dataDir, info.walDir)
      const uid = await this.ownerUidOf(walDir)
      if (uid !== null && uid !== ownerUid) {
        logWarning(
          `not removing WAL directory ${walDir}: owned by uid ${uid}, not by the cluster owner ${ownerUid}`,
        )
      } else if (uid !== null) {
        await this.bestEffort(`Removing WAL directory ${walDir}`, () =>
          rm(walDir, { recursive: true, force: true }),
        )
      }
    }

    await this.bestEffort(`Removing data directory ${dataDir}`, () =>
      rm(dataDir, { recursive: true, force: true }),
    )
    await this.bestEffort('Removing empty version data directory', () =>
      this.removeEmptyDir(dirname(dataDir)),
    )
  }

  private async removeSocketDirectory(info: ClusterInfo): Promise<void> {
    const socketDir = info.socketDir
    if (
      defaults.sharedSocketDirs.includes(socketDir) ||
      socketDir === this.ctx.layout.socketRoot
    ) {
      return
    }
    for (const file of [`.s.PGSQL.${info.port}`, `.s.PGSQL.${info.port}.lock`]) {
      await rm(join(socketDir, file), { force: true })
    }
    // other clusters may still use it
    await this.removeEmptyDir(socketDir)
  }

  async drop(version: string, name: string, options: DropOptions = {}): Promise<void> {
    if (!(await this.registry.exists(version, name))) {
      throw clusterNotFoundError(version, name)
    }

    let info: ClusterInfo
    try {
      info = await this.registry.describe(version, name)
    } catch (error) {
      if (!(error instanceof PgClusterError) || error.code !== ErrorCodes.CLUSTER_INFO_MISSING) {
        throw error
      }
      logWarning(`cluster ${version}/${name} is broken, removing its configuration only`)
      await rm(this.ctx.paths.configPath(version, name), { recursive: true, force: true })
      return
    }

    if (info.running) {
      if (!options.stopIfRunning) throw clusterRunningError(version, name)
      await this.control.stop(info, 'fast')
    }

    logInfo(`Dropping cluster ${version}/${name}`, { dataDir: info.dataDir })

    await this.removeDataDirectory(info)

    const statsTemp = info.config.stats_temp_directory
    if (statsTemp && info.ownerUid !== null && (await this.ownerUidOf(statsTemp)) === info.ownerUid) {
      await this.bestEffort(`Removing stats temp directory ${statsTemp}`, () =>
        rm(statsTemp, { recursive: true, force: true }),
      )
    }

    await this.bestEffort(`Removing configuration directory ${info.configDir}`, () =>
      rm(info.configDir, { recursive: true, force: true }),
    )
    await this.bestEffort('Removing empty version configuration directory', () =>
      this.removeEmptyDir(dirname(info.configDir)),
    )

    for (const file of await logFamily(info.logFile)) {
      await this.bestEffort(`Removing log file ${file}`, () => rm(file, { force: true }))
    }

    await this.bestEffort(`Removing socket directory ${info.socketDir}`, () =>
      this.removeSocketDirectory(info),
    )

    logDebug(`Dropped cluster ${version}/${name}`)
  }

  async rename(version: string, oldName: string, newName: string): Promise<ClusterInfo> {
    if (oldName === newName) {
      throw validationError(
        ErrorCodes.INVALID_ARGUMENTS,
        'old and new cluster name must be different',
        { version, cluster: oldName },
      )
    }
    assertValidClusterName(newName)
    if (!(await this.registry.exists(version, oldName))) {
      throw clusterNotFoundError(version, oldName)
    }
    if (await this.registry.exists(version, newName)) {
      throw clusterExistsError(version, newName)
    }

    const info = await this.registry.describe(version, oldName)
    const wasRunning = info.running
    if (wasRunning) {
      await this.control.stop(info)
    }

    const newConfigDir = this.ctx.paths.configPath(version, newName)
    await moveEntry(info.configDir, newConfigDir)

    const substitute = (value: string) => replaceWholeWord(value, oldName, newName)
    await editConfFile(join(newConfigDir, 'postgresql.conf'), (doc) => {
      let changed = false
      for (const key of CLUSTER_PATH_SETTINGS) {
        const value = doc.get(key)
        if (value === undefined) continue
        const renamed = substitute(value)
        if (renamed !== value) {
          doc.set(key, renamed)
          changed = true
        }
      }
      return changed
    })

    if (info.dataDir) {
      const newDataDir = substitute(info.dataDir)
      if (newDataDir !== info.dataDir && (await pathExists(info.dataDir))) {
        await moveEntry(info.dataDir, newDataDir)
      }
    }

    const statsTemp = info.config.stats_temp_directory
    if (statsTemp && substitute(statsTemp) !== statsTemp && (await pathExists(statsTemp))) {
      await moveEntry(statsTemp, substitute(statsTemp))
    }

    if (!info.customLog) {
      const newLog = this.ctx.paths.defaultLogPath(version, newName)
      for (const file of await logFamily(info.logFile)) {
        const suffix = basename(file).slice(basename(info.logFile).length)
        await moveEntry(file, `${newLog}${suffix}`)
      }
    }

    logInfo(`Renamed cluster ${version}/${oldName} to ${version}/${newName}`)

    const renamed = await this.registry.describe(version, newName)
    if (wasRunning) {
      await this.control.start(renamed)
      return this.registry.describe(version, newName)
    }
    return renamed
  }
}
