/**
 * Restore a cluster from a backup made by BackupManager
 */

import { chmod, chown, cp, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { basename, dirname, join, resolve } from 'path'
import { fileModes, versionFeatures } from '../config/defaults'
import type { BackupKind, ClusterInfo, Owner, ProgressCallback } from '../types'
import { databaseFromDumpFile, parseBackupName, readBackupStatus } from './backup-manager'
import { copyClusterFile } from './cluster-files'
import type { ClusterControl } from './cluster-control'
import type { ClusterCreator } from './cluster-creator'
import { CLUSTER_PATH_SETTINGS, replaceWholeWord, type ClusterManager } from './cluster-manager'
import type { ClusterRegistry } from './cluster-registry'
import { editConfFile, quoteConfValue } from './conf-file'
import type { ClusterContext } from './context'
import {
  ErrorCodes,
  assertValidClusterName,
  clusterExistsError,
  isMissingFileError,
  logInfo,
  logWarning,
  validationError,
} from './error-handler'
import { ensureDirectory, pathExists } from './fs-error-utils'
import { filterGlobals } from './cluster-upgrade'
import { psqlTarget, type ProcessManager } from './process-manager'
import { TransactionManager } from './transaction-manager'
import { isValidMajorVersion, versionAtLeast } from './version-utils'

export type RestoreOptions = {
  // path of a <timestamp>.dump or <timestamp>.backup directory
  backup: string
  owner: Owner
  // taken from the backup's <version>-<cluster> directory by default
  version?: string
  name?: string
  port?: number
  dataDir?: string
  start?: boolean
  // base backups: replay archived WAL
  archive?: boolean
  // base backups: stop recovery at this time
  recoveryTargetTime?: string
  // base backups: WAL archive other than the backup's wal/ directory
  walArchive?: string
  onProgress?: ProgressCallback
}

export type BackupLocation = {
  path: string
  kind: BackupKind
  version: string
  name: string
}

export type RestoreResult = {
  info: ClusterInfo
  kind: BackupKind
}

const RESTORED_CONFIG_FILES = [
  'postgresql.conf',
  'pg_hba.conf',
  'pg_ident.conf',
  'start.conf',
  'pg_ctl.conf',
  'environment',
] as const

/**
 * Version, cluster and kind of a backup from its path:
 * <backup-root>/<version>-<cluster>/<timestamp>.<kind>
 */
export function parseBackupLocation(path: string): BackupLocation | null {
  const absolute = resolve(path)
  const parsed = parseBackupName(basename(absolute))
  const owner = /^(\d+(?:\.\d+)?)-(.+)$/.exec(basename(dirname(absolute)))
  if (!parsed || !owner) return null
  return { path: absolute, kind: parsed.kind, version: owner[1], name: owner[2] }
}

/**
 * restore_command fetching segments from a WAL archive that may hold
 * gzipped segments
 */
export function restoreCommand(walArchive: string): string {
  return `f="${walArchive}/%f"; if [ -f "$f.gz" ]; then gunzip -c "$f.gz" > "%p"; else cp "$f" "%p"; fi`
}

export class RestoreManager {
  constructor(
    private readonly ctx: ClusterContext,
    private readonly registry: ClusterRegistry,
    private readonly processes: ProcessManager,
    private readonly control: ClusterControl,
    private readonly creator: ClusterCreator,
    private readonly manager: ClusterManager,
  ) {}

  private async giveToOwner(path: string, owner: Owner): Promise<void> {
    if (this.ctx.host.identity.isPrivileged()) await chown(path, owner.uid, owner.gid)
  }

  async restore(options: RestoreOptions): Promise<RestoreResult> {
    const location = parseBackupLocation(options.backup)
    if (!location) {
      throw validationError(
        ErrorCodes.BACKUP_NOT_FOUND,
        `${options.backup} is not a backup directory`,
        { backup: options.backup },
        'Expected <backup-root>/<version>-<cluster>/<timestamp>.dump or .backup',
      )
    }
    const status = await readBackupStatus(location.path)
    if (!status) {
      throw validationError(ErrorCodes.BACKUP_NOT_FOUND, `${location.path} has no status file`, {
        backup: location.path,
      })
    }
    if (status.status !== 'ok') {
      throw validationError(
        ErrorCodes.BACKUP_NOT_FOUND,
        `backup ${location.path} did not complete (status: ${status.status})`,
        { backup: location.path },
      )
    }

    const version = options.version ?? location.version
    const name = options.name ?? location.name
    if (!isValidMajorVersion(version)) {
      throw validationError(ErrorCodes.INVALID_VERSION, `invalid version "${version}"`, { version })
    }
    assertValidClusterName(name)
    if (await this.registry.exists(version, name)) {
      throw clusterExistsError(version, name)
    }

    logInfo(`Restoring ${location.path} as ${version}/${name}`)
    const info =
      location.kind === 'dump'
        ? await this.restoreDump(location, version, name, options)
        : await this.restoreBasebackup(location, version, name, options)
    return { info, kind: location.kind }
  }

  /**
   * Unpack config.tar.gz and copy the cluster files into `configDir`.
   * `settings` are written over the restored postgresql.conf; other
   * path settings get the old cluster name replaced.
   */
  private async restoreSavedConfig(
    location: BackupLocation,
    configDir: string,
    name: string,
    owner: Owner,
    settings: Array<[string, string]>,
  ): Promise<void> {
    const scratch = await mkdtemp(join(tmpdir(), 'pgcluster-restore-'))
    try {
      await this.processes.runTool('tar', ['-xzf', join(location.path, 'config.tar.gz'), '-C', scratch])
      for (const file of RESTORED_CONFIG_FILES) {
        const dest = join(configDir, file)
        if (await copyClusterFile(join(scratch, file), dest)) await this.giveToOwner(dest, owner)
      }
      if (await pathExists(join(scratch, 'conf.d'))) {
        await cp(join(scratch, 'conf.d'), join(configDir, 'conf.d'), { recursive: true, force: true })
      }
    } finally {
      await rm(scratch, { recursive: true, force: true })
    }

    const forced = new Set(settings.map(([key]) => key))
    await editConfFile(join(configDir, 'postgresql.conf'), (doc) => {
      for (const key of CLUSTER_PATH_SETTINGS) {
        const value = doc.get(key)
        if (value === undefined || forced.has(key) || name === location.name) continue
        doc.set(key, replaceWholeWord(value, location.name, name))
      }
      for (const [key, value] of settings) doc.set(key, value)
      return true
    })
  }

  private async ownerName(owner: Owner): Promise<string> {
    const account = await this.ctx.host.accounts.userByUid(owner.uid)
    if (!account) {
      throw validationError(ErrorCodes.OWNERSHIP_INVALID, `user id ${owner.uid} does not exist`, {
        uid: owner.uid,
      })
    }
    return account.name
  }

  /**
   * New cluster, saved configuration, globals, then every database dump
   */
  private async restoreDump(
    location: BackupLocation,
    version: string,
    name: string,
    options: RestoreOptions,
  ): Promise<ClusterInfo> {
    const ownerName = await this.ownerName(options.owner)
    const tx = new TransactionManager()
    const report = (stage: string, message: string) => options.onProgress?.({ stage, message })

    try {
      report('create', `Creating cluster ${version}/${name}`)
      const created = await tx.step({
        description: `Create cluster ${version}/${name}`,
        run: async () =>
          (
            await this.creator.create({
              version,
              name,
              owner: options.owner,
              port: options.port,
              dataDir: options.dataDir,
            })
          ).info,
        undo: () => this.manager.drop(version, name, { stopIfRunning: true }),
      })

      report('config', 'Restoring configuration')
      await tx.step({
        description: 'Restore configuration',
        run: () => {
          const keep: Array<[string, string]> = []
          for (const key of [...CLUSTER_PATH_SETTINGS, 'port']) {
            const value = created.config[key]
            if (value !== undefined) keep.push([key, value])
          }
          return this.restoreSavedConfig(location, created.configDir, name, options.owner, keep)
        },
      })

      report('start', `Starting cluster ${version}/${name}`)
      await this.control.start(await this.registry.describe(version, name), { force: true })
      const target = psqlTarget(await this.registry.describe(version, name))

      report('globals', 'Restoring global objects')
      let globals = ''
      try {
        globals = await readFile(join(location.path, 'globals.sql'), 'utf8')
      } catch (error) {
        if (!isMissingFileError(error)) throw error
        logWarning(`${location.path} has no globals.sql, skipping roles and tablespaces`)
      }
      const { script, deferred } = filterGlobals(globals, ownerName)
      await tx.step({
        description: 'Restore global objects',
        run: () => this.processes.runScript(target, script),
      })

      for (const file of (await readdir(location.path)).sort()) {
        const database = databaseFromDumpFile(file)
        if (database === null) continue
        report('databases', `Restoring database ${database}`)
        await tx.step({
          description: `Restore database ${database}`,
          run: () => this.processes.restoreFile(target, join(location.path, file), database),
        })
      }
      if (deferred.length > 0) {
        await this.processes.runScript(target, `${deferred.join('\n')}\n`)
      }

      if (options.start === false) {
        await this.control.stop(await this.registry.describe(version, name))
      }
      tx.commit()
    } catch (error) {
      logWarning(`Restoring ${version}/${name} failed, removing it again`)
      await tx.rollback()
      throw error
    }
    return this.registry.describe(version, name)
  }

  /**
   * Configuration and data directory from the tarballs, plus recovery
   * settings when WAL replay is wanted
   */
  private async restoreBasebackup(
    location: BackupLocation,
    version: string,
    name: string,
    options: RestoreOptions,
  ): Promise<ClusterInfo> {
    const { owner } = options
    if (owner.uid === 0) {
      throw validationError(ErrorCodes.OWNERSHIP_INVALID, 'clusters must not be owned by root', {
        uid: owner.uid,
      })
    }
    await this.ownerName(owner)
    const privileged = this.ctx.host.identity.isPrivileged()
    const port = await this.registry.claimPort(options.port)
    const configDir = this.ctx.paths.configPath(version, name)
    const dataDir = options.dataDir ?? this.ctx.paths.defaultDataPath(version, name)
    const report = (stage: string, message: string) => options.onProgress?.({ stage, message })
    const tx = new TransactionManager()

    try {
      report('config', `Restoring configuration into ${configDir}`)
      await tx.step({
        description: `Create configuration directory ${configDir}`,
        run: async () => {
          const versionDir = await ensureDirectory(dirname(configDir), { mode: fileModes.configDir })
          const created = await ensureDirectory(configDir, {
            owner: privileged ? owner : null,
            mode: fileModes.configDir,
          })
          return versionDir ?? created ?? configDir
        },
        undo: (top) => rm(top, { recursive: true, force: true }),
      })
      await tx.step({
        description: 'Restore configuration',
        run: () =>
          this.restoreSavedConfig(location, configDir, name, owner, [
            ['data_directory', dataDir],
            ['hba_file', join(configDir, 'pg_hba.conf')],
            ['ident_file', join(configDir, 'pg_ident.conf')],
            ['port', String(port)],
          ]),
      })

      report('data', `Unpacking base backup into ${dataDir}`)
      await tx.step({
        description: `Create data directory ${dataDir}`,
        run: async () => {
          const created = await ensureDirectory(dataDir, {
            owner: privileged ? owner : null,
            mode: fileModes.dataDir,
          })
          if (created === null && (await readdir(dataDir)).length > 0) {
            throw validationError(
              ErrorCodes.INVALID_ARGUMENTS,
              `data directory ${dataDir} is not empty`,
              { dataDir },
            )
          }
          return created
        },
        undo: async (created) => {
          if (created) {
            await rm(created, { recursive: true, force: true })
            return
          }
          for (const entry of await readdir(dataDir)) {
            await rm(join(dataDir, entry), { recursive: true, force: true })
          }
        },
      })
      await tx.step({
        description: 'Unpack base backup',
        run: async () => {
          const asOwner = this.processes.asOwner(owner)
          await this.processes.runTool('tar', ['-xzf', join(location.path, 'base.tar.gz'), '-C', dataDir], asOwner)
          const walArchive = join(location.path, 'pg_wal.tar.gz')
          if (await pathExists(walArchive)) {
            const walName = versionAtLeast(version, versionFeatures.walDirName) ? 'pg_wal' : 'pg_xlog'
            await ensureDirectory(join(dataDir, walName), {
              owner: privileged ? owner : null,
              mode: fileModes.dataDir,
            })
            await this.processes.runTool('tar', ['-xzf', walArchive, '-C', join(dataDir, walName)], asOwner)
          }
        },
      })

      if (options.archive || options.recoveryTargetTime) {
        report('recovery', 'Writing recovery settings')
        await tx.step({
          description: 'Write recovery settings',
          run: () => this.writeRecovery(version, configDir, dataDir, owner, location, options),
        })
      }

      await ensureDirectory(this.ctx.layout.logRoot)
      tx.commit()
    } catch (error) {
      logWarning(`Restoring ${version}/${name} failed, removing it again`)
      await tx.rollback()
      throw error
    }

    let info = await this.registry.describe(version, name)
    if (options.start) {
      report('start', `Starting cluster ${version}/${name}`)
      await this.control.start(info)
      info = await this.registry.describe(version, name)
    }
    return info
  }

  private async writeRecovery(
    version: string,
    configDir: string,
    dataDir: string,
    owner: Owner,
    location: BackupLocation,
    options: RestoreOptions,
  ): Promise<void> {
    const walArchive = options.walArchive ?? join(dirname(location.path), 'wal')
    const settings: Array<[string, string]> = [['restore_command', restoreCommand(walArchive)]]
    if (options.recoveryTargetTime) {
      settings.push(['recovery_target_time', options.recoveryTargetTime])
    }

    if (versionAtLeast(version, versionFeatures.recoverySignal)) {
      await editConfFile(join(configDir, 'postgresql.conf'), (doc) => {
        for (const [key, value] of settings) doc.set(key, value)
        return true
      })
      const signal = join(dataDir, 'recovery.signal')
      await writeFile(signal, '')
      await chmod(signal, 0o600)
      await this.giveToOwner(signal, owner)
      return
    }

    const recoveryConf = join(dataDir, 'recovery.conf')
    await writeFile(
      recoveryConf,
      settings.map(([key, value]) => `${key} = ${quoteConfValue(value)}\n`).join(''),
    )
    await chmod(recoveryConf, 0o600)
    await this.giveToOwner(recoveryConf, owner)
  }
}
