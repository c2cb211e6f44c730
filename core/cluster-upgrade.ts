/**
 * Major-version upgrade
 *
 * An upgrade walks a fixed sequence of states. Everything from creating
 * the new cluster onward runs through a TransactionManager, so a failure
 * drops the new cluster, puts the ports back and restarts the old
 * cluster if it was running before.
 */

import { chmod, chown, cp, lstat, mkdtemp, readFile, readdir, readlink, rm, writeFile } from 'fs/promises'
import type { Stats } from 'fs'
import { tmpdir } from 'os'
import { isAbsolute, join, relative, resolve, sep } from 'path'
import { fileModes, versionFeatures } from '../config/defaults'
import { rulesBetween, type UpgradeRule } from '../config/upgrade-rules'
import type { ClusterInfo, LocaleSettings, Owner, ProgressCallback, UpgradeMethod } from '../types'
import { copyClusterFile, setStartConf, startConfPath } from './cluster-files'
import type { ClusterControl } from './cluster-control'
import type { ClusterCreator } from './cluster-creator'
import { CLUSTER_PATH_SETTINGS, escapeRegExp, replaceWholeWord, type ClusterManager } from './cluster-manager'
import { isExecutable, type ClusterRegistry } from './cluster-registry'
import { configBool, editConfFile, setConfFileValue, type ConfigDocument } from './conf-file'
import type { ClusterContext } from './context'
import {
  ErrorCodes,
  PgClusterError,
  assertValidClusterName,
  clusterExistsError,
  clusterNotFoundError,
  isMissingFileError,
  logDebug,
  logInfo,
  logWarning,
  validationError,
} from './error-handler'
import { ensureDirectory, pathExists } from './fs-error-utils'
import { restrictedHbaRules } from './hba'
import { assertValidExplicitPort } from './port-manager'
import { ownerOf, psqlTarget, type ProcessManager, type PsqlTarget } from './process-manager'
import { TransactionManager } from './transaction-manager'
import { compareVersions, isValidMajorVersion, versionAtLeast } from './version-utils'

export type UpgradeState =
  | 'validate'
  | 'stop-source'
  | 'create-target'
  | 'migrate-config'
  | 'init-hooks'
  | 'migrate-data'
  | 'swap-ports'
  | 'disable-source'
  | 'start-target'
  | 'finish-hooks'
  | 'done'

export type HookPhase = 'init' | 'finish'

export type UpgradeOptions = {
  version: string
  name: string
  // newest installed version by default
  newVersion?: string
  newName?: string
  method?: UpgradeMethod
  // explicit port for the new cluster; disables the port swap
  port?: number
  // pg_upgrade --jobs
  jobs?: number
  // leave the new cluster on its own port
  keepPort?: boolean
  noStart?: boolean
  // leave everything in place when the upgrade fails
  keepOnError?: boolean
  // overrides for the locale read from the old cluster
  locale?: LocaleSettings
  // binaries of the old version for pg_upgrade
  oldBindir?: string
  onProgress?: ProgressCallback
}

export type UpgradeResult = {
  source: ClusterInfo
  target: ClusterInfo
  method: UpgradeMethod
  states: UpgradeState[]
  // rules that changed the new cluster's configuration
  appliedRules: string[]
}

type UpgradeSession = {
  source: ClusterInfo
  owner: Owner
  ownerName: string
  newVersion: string
  newName: string
  method: UpgradeMethod
  swapPorts: boolean
  rules: UpgradeRule[]
  oldBindir: string
}

// copied from the old configuration directory when present
const COPIED_CONFIG_FILES = [
  'postgresql.conf',
  'pg_hba.conf',
  'pg_ident.conf',
  'start.conf',
  'pg_ctl.conf',
  'environment',
] as const

const SSL_FILE_SETTINGS = ['ssl_cert_file', 'ssl_key_file', 'ssl_ca_file', 'ssl_crl_file'] as const

// what ssl_cert_file and ssl_key_file fall back to, relative to the data directory
const DEFAULT_SSL_FILES: Partial<Record<(typeof SSL_FILE_SETTINGS)[number], string>> = {
  ssl_cert_file: 'server.crt',
  ssl_key_file: 'server.key',
}

// data directory files that carried SSL before the ssl_*_file settings
const LEGACY_SSL_FILES: ReadonlyArray<[string, (typeof SSL_FILE_SETTINGS)[number]]> = [
  ['server.crt', 'ssl_cert_file'],
  ['server.key', 'ssl_key_file'],
  ['root.crt', 'ssl_ca_file'],
  ['root.crl', 'ssl_crl_file'],
]

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

function isBinaryMethod(method: UpgradeMethod): boolean {
  return method !== 'dump'
}

function isInside(path: string, dir: string): boolean {
  return path.startsWith(dir.endsWith(sep) ? dir : dir + sep)
}

function timestamp(date = new Date()): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\..*$/, '')
}

/**
 * Apply version rules to a configuration document. Returns a line per
 * rule that changed something.
 */
export function applyUpgradeRules(doc: ConfigDocument, rules: readonly UpgradeRule[]): string[] {
  const applied: string[] = []
  for (const rule of rules) {
    const value = doc.get(rule.key)
    if (value === undefined) continue
    if (rule.kind === 'deprecate' || !rule.newKey) {
      doc.disable(rule.key, rule.reason)
    } else {
      const newValue = rule.compute ? rule.compute(value) : value
      if (newValue === null) {
        doc.disable(rule.key, rule.reason)
      } else {
        doc.replace(rule.key, rule.reason, rule.newKey, newValue)
      }
    }
    applied.push(`${rule.key}: ${rule.reason}`)
  }
  return applied
}

/**
 * Split a pg_dumpall --globals-only script for a fresh cluster: the
 * owner's CREATE ROLE goes (initdb made that role), and a read-only
 * default for the owner is held back until all databases are restored
 */
export function filterGlobals(
  dump: string,
  owner: string,
): { script: string; deferred: string[] } {
  const name = `(?:"${escapeRegExp(owner.replace(/"/g, '""'))}"|${escapeRegExp(owner)})`
  const createOwner = new RegExp(`^CREATE ROLE ${name};$`)
  const readOnly = new RegExp(`^ALTER ROLE ${name} SET default_transaction_read_only\\b`)
  const lines: string[] = []
  const deferred: string[] = []
  for (const line of dump.split('\n')) {
    if (createOwner.test(line)) continue
    if (readOnly.test(line)) {
      deferred.push(line)
      continue
    }
    lines.push(line)
  }
  return { script: lines.join('\n'), deferred }
}

export class ClusterUpgrader {
  constructor(
    private readonly ctx: ClusterContext,
    private readonly registry: ClusterRegistry,
    private readonly processes: ProcessManager,
    private readonly control: ClusterControl,
    private readonly creator: ClusterCreator,
    private readonly manager: ClusterManager,
  ) {}

  private get privileged(): boolean {
    return this.ctx.host.identity.isPrivileged()
  }

  private async giveToOwner(path: string, owner: Owner): Promise<void> {
    if (this.privileged) await chown(path, owner.uid, owner.gid)
  }

  private async validate(options: UpgradeOptions): Promise<UpgradeSession> {
    const { version, name } = options
    if (!(await this.registry.exists(version, name))) {
      throw clusterNotFoundError(version, name)
    }
    const source = await this.registry.describe(version, name)

    const newVersion = options.newVersion ?? (await this.registry.newestVersion('initdb'))
    if (!newVersion) {
      throw validationError(ErrorCodes.VERSION_NOT_INSTALLED, 'no PostgreSQL server version is installed')
    }
    if (!isValidMajorVersion(newVersion)) {
      throw validationError(ErrorCodes.INVALID_VERSION, `invalid version "${newVersion}"`, {
        version: newVersion,
      })
    }
    if (compareVersions(newVersion, version) <= 0) {
      throw validationError(
        ErrorCodes.INVALID_VERSION,
        `version ${newVersion} is not newer than ${version}`,
        { version, newVersion },
      )
    }
    const newName = options.newName ?? name
    assertValidClusterName(newName)
    if (await this.registry.exists(newVersion, newName)) {
      throw clusterExistsError(newVersion, newName)
    }
    if (source.recovery) {
      throw validationError(
        ErrorCodes.CLUSTER_IN_RECOVERY,
        `cluster ${version}/${name} is in recovery mode, upgrade the primary instead`,
        { version, cluster: name },
      )
    }
    await this.registry.validateOwnership(source)

    const method = options.method ?? 'dump'
    await this.registry.requireProgram('initdb', newVersion)
    await this.registry.requireProgram(isBinaryMethod(method) ? 'pg_upgrade' : 'pg_restore', newVersion)
    if (options.port !== undefined) assertValidExplicitPort(options.port)

    const owner = ownerOf(source)
    const account = await this.ctx.host.accounts.userByUid(owner.uid)
    if (!account) {
      throw validationError(ErrorCodes.OWNERSHIP_INVALID, `user id ${owner.uid} does not exist`, {
        uid: owner.uid,
      })
    }

    return {
      source,
      owner,
      ownerName: account.name,
      newVersion,
      newName,
      method,
      swapPorts: !options.keepPort && options.port === undefined,
      rules: rulesBetween(version, newVersion),
      oldBindir: options.oldBindir ?? this.ctx.paths.binPath(version),
    }
  }

  async upgrade(options: UpgradeOptions): Promise<UpgradeResult> {
    const states: UpgradeState[] = []
    const enter = (state: UpgradeState, message: string) => {
      states.push(state)
      logDebug(`Upgrade state: ${state}`)
      options.onProgress?.({ stage: state, message })
    }

    enter('validate', `Checking cluster ${options.version}/${options.name}`)
    const session = await this.validate(options)
    const { source, newVersion, newName } = session
    logInfo(`Upgrading cluster ${source.version}/${source.name} to ${newVersion}/${newName}`, {
      method: session.method,
    })

    const hbaDir = await this.writeRestrictedHba(session)
    const hbaOption = `-c hba_file="${join(hbaDir, 'pg_hba.conf')}"`
    const tx = new TransactionManager()
    const appliedRules: string[] = []

    try {
      // stop-source
      enter('stop-source', `Stopping cluster ${source.version}/${source.name}`)
      await tx.step({
        description: `Stop cluster ${source.version}/${source.name}`,
        run: async () => {
          if (source.running) await this.control.stop(source)
        },
        undo: () => this.restoreSource(source),
      })

      // the old cluster answers only its owner while we read from it
      await this.control.start(await this.describeSource(source), {
        force: true,
        serverOptions: [hbaOption],
      })
      const running = await this.describeSource(source)
      const locale: LocaleSettings = {
        ...(await this.processes.databaseLocales(psqlTarget(running))),
        ...options.locale,
      }
      const controlData = running.dataDir
        ? await this.processes.controlData(source.version, running.dataDir)
        : {}
      const checksums = (controlData['Data page checksum version'] ?? '0') !== '0'
      // clusters with encrypted storage need the same key for the new data directory
      const keyCommand = running.config.encryption_key_command
      if (isBinaryMethod(session.method)) {
        await this.control.stop(running)
      }

      // create-target
      enter('create-target', `Creating cluster ${newVersion}/${newName}`)
      const workPort = options.port ?? (await this.registry.nextFreePort())
      let target = await tx.step({
        description: `Create cluster ${newVersion}/${newName}`,
        run: async () =>
          (
            await this.creator.create({
              version: newVersion,
              name: newName,
              owner: session.owner,
              port: workPort,
              dataDir: this.targetDataDir(session),
              logFile: this.targetLogFile(session),
              locale,
              dataChecksums: checksums,
              initdbOptions: keyCommand ? ['--encryption-key-command', keyCommand] : undefined,
            })
          ).info,
        undo: () => this.manager.drop(newVersion, newName, { stopIfRunning: true }),
      })

      // migrate-config
      enter('migrate-config', `Copying configuration to ${newVersion}/${newName}`)
      await tx.step({
        description: 'Migrate configuration',
        run: async () => {
          appliedRules.push(...(await this.migrateConfig(session, target)))
        },
      })
      target = await this.registry.describe(newVersion, newName)
      for (const line of appliedRules) logInfo(`Configuration of ${newVersion}/${newName}: ${line}`)

      if (!isBinaryMethod(session.method)) {
        await this.control.start(target, { force: true, serverOptions: [hbaOption] })
        target = await this.registry.describe(newVersion, newName)
      }

      // init-hooks
      enter('init-hooks', 'Running init hooks')
      await tx.step({
        description: 'Run init hooks',
        run: () => this.runHooks('init', session),
      })

      // migrate-data
      enter(
        'migrate-data',
        isBinaryMethod(session.method)
          ? `Running pg_upgrade (${session.method})`
          : 'Dumping databases into the new cluster',
      )
      await tx.step({
        description: 'Migrate data',
        run: async () => {
          if (isBinaryMethod(session.method)) {
            await this.runBinaryUpgrade(session, target, options.jobs)
          } else {
            await this.migrateDump(session, await this.describeSource(source), target)
          }
        },
      })
      await this.stopIfRunning(source.version, source.name)
      await this.stopIfRunning(newVersion, newName)

      // swap-ports
      if (session.swapPorts) {
        enter('swap-ports', `Moving ${newVersion}/${newName} to port ${source.port}`)
        const sourceConf = join(source.configDir, 'postgresql.conf')
        const targetConf = join(target.configDir, 'postgresql.conf')
        await tx.step({
          description: 'Swap ports',
          run: async () => {
            await setConfFileValue(sourceConf, 'port', String(target.port))
            await setConfFileValue(targetConf, 'port', String(source.port))
          },
          undo: async () => {
            await setConfFileValue(sourceConf, 'port', String(source.port))
            await setConfFileValue(targetConf, 'port', String(target.port))
          },
        })
      }

      // disable-source
      enter('disable-source', `Disabling automatic startup of ${source.version}/${source.name}`)
      const previousStartConf = await this.readStartConf(source.configDir)
      await tx.step({
        description: 'Set old cluster to manual startup',
        run: () =>
          setStartConf(
            source.configDir,
            'manual',
            `upgraded to ${newVersion}/${newName}, kept for reference`,
          ),
        undo: async () => {
          const path = startConfPath(source.configDir)
          if (previousStartConf === null) {
            await rm(path, { force: true })
          } else {
            await writeFile(path, previousStartConf)
          }
        },
      })

      // start-target
      target = await this.registry.describe(newVersion, newName)
      if (options.noStart) {
        logDebug(`Not starting ${newVersion}/${newName}`)
      } else if (target.start === 'disabled') {
        logInfo(`Cluster ${newVersion}/${newName} is disabled in start.conf, not starting it`)
      } else {
        enter('start-target', `Starting cluster ${newVersion}/${newName}`)
        await tx.step({
          description: `Start cluster ${newVersion}/${newName}`,
          run: () => this.control.start(target),
        })
      }

      // finish-hooks
      enter('finish-hooks', 'Running finish hooks')
      await tx.step({
        description: 'Run finish hooks',
        run: () => this.runHooks('finish', session),
      })

      tx.commit()
    } catch (error) {
      if (options.keepOnError) {
        logWarning(
          `Upgrade of ${source.version}/${source.name} failed, leaving ${newVersion}/${newName} in place`,
        )
      } else {
        logWarning(`Upgrade of ${source.version}/${source.name} failed, rolling back`)
        await tx.rollback()
      }
      throw error
    } finally {
      await rm(hbaDir, { recursive: true, force: true })
    }

    enter('done', `Upgraded ${source.version}/${source.name} to ${newVersion}/${newName}`)
    logInfo(`Upgraded cluster ${source.version}/${source.name} to ${newVersion}/${newName}`)

    return {
      source: await this.registry.describe(source.version, source.name),
      target: await this.registry.describe(newVersion, newName),
      method: session.method,
      states,
      appliedRules,
    }
  }

  private describeSource(source: ClusterInfo): Promise<ClusterInfo> {
    return this.registry.describe(source.version, source.name)
  }

  private async stopIfRunning(version: string, name: string): Promise<void> {
    const info = await this.registry.describe(version, name)
    if (info.running) await this.control.stop(info)
  }

  /**
   * Bring the old cluster back to how the upgrade found it
   */
  private async restoreSource(source: ClusterInfo): Promise<void> {
    await this.stopIfRunning(source.version, source.name)
    if (source.running) {
      await this.control.start(await this.describeSource(source), { force: true })
    }
  }

  private async readStartConf(configDir: string): Promise<string | null> {
    try {
      return await readFile(startConfPath(configDir), 'utf8')
    } catch (error) {
      if (isMissingFileError(error)) return null
      throw error
    }
  }

  /**
   * pg_hba.conf admitting only the owner over the local socket
   */
  private async writeRestrictedHba(session: UpgradeSession): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), 'pgcluster-hba-'))
    await chmod(dir, fileModes.configDir)
    const path = join(dir, 'pg_hba.conf')
    await writeFile(path, restrictedHbaRules(session.ownerName))
    await chmod(path, fileModes.config)
    await this.giveToOwner(path, session.owner)
    return dir
  }

  private substitute(session: UpgradeSession, value: string): string {
    const { source, newVersion, newName } = session
    return replaceWholeWord(replaceWholeWord(value, source.version, newVersion), source.name, newName)
  }

  /**
   * The old data directory path with version and name swapped, when it is
   * not the default location
   */
  private targetDataDir(session: UpgradeSession): string | undefined {
    const { source } = session
    if (!source.dataDir) return undefined
    if (source.dataDir === this.ctx.paths.defaultDataPath(source.version, source.name)) {
      return undefined
    }
    const dataDir = this.substitute(session, source.dataDir)
    return dataDir !== source.dataDir ? dataDir : undefined
  }

  private targetLogFile(session: UpgradeSession): string | undefined {
    const { source } = session
    if (!source.customLog) return undefined
    const logFile = this.substitute(session, source.logFile)
    return logFile !== source.logFile ? logFile : undefined
  }

  /**
   * Copy the old configuration onto the new cluster, fix up its paths and
   * port, and apply the version rules. Returns the applied rule lines.
   */
  private async migrateConfig(session: UpgradeSession, target: ClusterInfo): Promise<string[]> {
    const { source, owner } = session
    for (const file of COPIED_CONFIG_FILES) {
      const dest = join(target.configDir, file)
      if (await copyClusterFile(join(source.configDir, file), dest)) {
        await this.giveToOwner(dest, owner)
      }
    }
    const confD = join(source.configDir, 'conf.d')
    if (await pathExists(confD)) {
      await cp(confD, join(target.configDir, 'conf.d'), {
        recursive: true,
        force: true,
        verbatimSymlinks: true,
      })
    }

    const sslSettings = await this.migrateSsl(session, target)
    const applied: string[] = []
    await editConfFile(join(target.configDir, 'postgresql.conf'), (doc) => {
      for (const key of CLUSTER_PATH_SETTINGS) {
        const value = doc.get(key)
        if (value === undefined) continue
        const updated = this.substitute(session, value)
        if (updated !== value) doc.set(key, updated)
      }
      if (target.dataDir) doc.set('data_directory', target.dataDir)
      doc.set('port', String(target.port))
      for (const [key, value] of sslSettings) doc.set(key, value)
      applied.push(...applyUpgradeRules(doc, session.rules))
      return true
    })

    if (source.dataDir && target.dataDir) {
      const autoConf = join(target.dataDir, 'postgresql.auto.conf')
      if (await copyClusterFile(join(source.dataDir, 'postgresql.auto.conf'), autoConf)) {
        await this.giveToOwner(autoConf, owner)
        await chmod(autoConf, 0o600)
        await editConfFile(autoConf, (doc) => {
          applied.push(...applyUpgradeRules(doc, session.rules))
          return true
        })
      }
    }
    return applied
  }

  /**
   * Copy SSL files kept inside the old cluster's directories and turn
   * legacy data directory symlinks into settings. Returns the settings
   * the new postgresql.conf needs.
   */
  private async migrateSsl(
    session: UpgradeSession,
    target: ClusterInfo,
  ): Promise<Array<[string, string]>> {
    const { source, owner } = session
    const settings: Array<[string, string]> = []
    const roots: Array<[string, string]> = [[source.configDir, target.configDir]]
    if (source.dataDir && target.dataDir) roots.push([source.dataDir, target.dataDir])

    const implicitFiles =
      configBool(source.config.ssl) === true &&
      versionAtLeast(source.version, versionFeatures.sslFileSettings)
    for (const key of SSL_FILE_SETTINGS) {
      const value = source.config[key] || (implicitFiles ? DEFAULT_SSL_FILES[key] : undefined)
      if (!value) continue
      const path = isAbsolute(value) || !source.dataDir ? value : join(source.dataDir, value)
      for (const [from, to] of roots) {
        if (!isInside(path, from)) continue
        const dest = join(to, relative(from, path))
        if (await copyClusterFile(path, dest)) {
          await this.giveToOwner(dest, owner)
          if (key === 'ssl_key_file') await chmod(dest, 0o600)
          settings.push([key, dest])
        }
        break
      }
    }

    if (!source.dataDir || versionAtLeast(source.version, versionFeatures.sslFileSettings)) {
      return settings
    }
    for (const [file, key] of LEGACY_SSL_FILES) {
      if (source.config[key]) continue
      const path = join(source.dataDir, file)
      let stats: Stats
      try {
        stats = await lstat(path)
      } catch (error) {
        if (isMissingFileError(error)) continue
        throw error
      }
      if (!versionAtLeast(session.newVersion, versionFeatures.sslFileSettings)) {
        if (target.dataDir) {
          await cp(path, join(target.dataDir, file), { verbatimSymlinks: true })
        }
      } else if (stats.isSymbolicLink()) {
        settings.push([key, resolve(source.dataDir, await readlink(path))])
      } else {
        const dest = join(target.configDir, file)
        await copyClusterFile(path, dest)
        await this.giveToOwner(dest, owner)
        if (key === 'ssl_key_file') await chmod(dest, 0o600)
        settings.push([key, dest])
      }
    }
    if (settings.some(([key]) => key === 'ssl_cert_file') && !source.config.ssl) {
      settings.push(['ssl', 'on'])
    }
    return settings
  }

  /**
   * Run the executable scripts of the hook directory in name order, as the
   * cluster owner; any failure ends the upgrade
   */
  private async runHooks(phase: HookPhase, session: UpgradeSession): Promise<void> {
    const dir = this.ctx.paths.upgradeHooksPath()
    let entries: string[]
    try {
      entries = await readdir(dir)
    } catch (error) {
      if (isMissingFileError(error)) return
      throw error
    }
    for (const entry of entries.sort()) {
      const path = join(dir, entry)
      if (!(await isExecutable(path))) continue
      logDebug(`Running ${phase} hook ${entry}`)
      try {
        await this.ctx.host.runner.run(
          path,
          [session.source.version, session.newName, session.newVersion, phase],
          this.processes.asOwner(session.owner),
        )
      } catch (error) {
        throw new PgClusterError(
          ErrorCodes.HOOK_FAILED,
          `${phase} hook ${entry} failed: ${error instanceof Error ? error.message : String(error)}`,
          'external-tool',
          undefined,
          { hook: path, phase },
        )
      }
    }
  }

  private async migrateDump(
    session: UpgradeSession,
    source: ClusterInfo,
    target: ClusterInfo,
  ): Promise<void> {
    const from = psqlTarget(source)
    const to = psqlTarget(target)

    const { stdout } = await this.processes.run(
      'pg_dumpall',
      target.version,
      this.processes.psqlArgs(from, '--globals-only', '--quote-all-identifiers'),
      this.processes.asOwner(session.owner),
    )
    const { script, deferred } = filterGlobals(stdout, session.ownerName)
    await this.processes.runScript(to, script)

    for (const database of await this.processes.listDatabases(from)) {
      if (database === 'template0') continue
      await this.migrateDatabase(source, from, to, database)
    }

    if (deferred.length > 0) {
      await this.processes.runScript(to, `${deferred.join('\n')}\n`)
    }
  }

  private async migrateDatabase(
    source: ClusterInfo,
    from: PsqlTarget,
    to: PsqlTarget,
    database: string,
  ): Promise<void> {
    const name = quoteLiteral(database)
    const allowConnections = (allow: boolean) =>
      `UPDATE pg_database SET datallowconn = '${allow ? 't' : 'f'}' WHERE datname = ${name}`

    const blocked =
      (await this.processes.query(from, `SELECT datallowconn FROM pg_database WHERE datname = ${name}`)) === 'f'
    if (blocked) {
      logDebug(`Temporarily allowing connections to ${database}`)
      await this.processes.query(from, allowConnections(true))
    }
    try {
      const libdir = join(this.ctx.layout.binRoot, source.version, 'lib')
      await this.processes.query(
        from,
        `UPDATE pg_proc SET probin = regexp_replace(probin, ${quoteLiteral(`^${escapeRegExp(libdir)}/`)}, '$libdir/') WHERE probin LIKE ${quoteLiteral(`${libdir}/%`)}`,
        database,
      )
      logDebug(`Copying database ${database}`)
      await this.processes.dumpInto(from, to, database)
    } finally {
      if (blocked) {
        await this.processes.query(from, allowConnections(false))
        await this.processes.query(to, allowConnections(false))
      }
    }
  }

  private async runBinaryUpgrade(
    session: UpgradeSession,
    target: ClusterInfo,
    jobs?: number,
  ): Promise<void> {
    const { source } = session
    if (!source.dataDir || !target.dataDir) {
      throw validationError(ErrorCodes.CLUSTER_INFO_MISSING, 'data directory unknown', {
        source: source.dataDir,
        target: target.dataDir,
      })
    }
    const logDir = join(
      this.ctx.layout.logRoot,
      `pg_upgrade-${source.version}-${target.version}-${target.name}.${timestamp()}`,
    )
    await ensureDirectory(logDir, {
      owner: this.privileged ? session.owner : null,
      mode: fileModes.configDir,
    })

    const args = [
      '-b',
      session.oldBindir,
      '-B',
      this.ctx.paths.binPath(target.version),
      '-p',
      String(source.port),
      '-P',
      String(target.port),
      '-d',
      source.dataDir,
      '-D',
      target.dataDir,
      '-o',
      `-c config_file=${join(source.configDir, 'postgresql.conf')}`,
      '-O',
      `-c config_file=${join(target.configDir, 'postgresql.conf')}`,
    ]
    if (session.method === 'link') args.push('--link')
    if (session.method === 'clone') args.push('--clone')
    if (jobs !== undefined) args.push('--jobs', String(jobs))

    await this.processes.run(
      'pg_upgrade',
      target.version,
      args,
      this.processes.asOwner(session.owner, { cwd: logDir }),
    )
    logInfo(`pg_upgrade logs are in ${logDir}`)
  }
}
