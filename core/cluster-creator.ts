/**
 * Cluster creation
 *
 * Creation is a fixed table of steps run through a TransactionManager.
 * Each step that leaves something on disk registers how to take it away
 * again, so a failure anywhere before the commit leaves the host as it
 * was: no configuration directory, no new data directory, no log file.
 */

import { access, chmod, chown, constants, readFile, readdir, rm, stat, symlink, writeFile } from 'fs/promises'
import { basename, dirname, isAbsolute, join } from 'path'
import { defaults, fileModes, versionFeatures } from '../config/defaults'
import type { ClusterInfo, ConfigMap, LocaleSettings, Owner, ProgressCallback, StartMode } from '../types'
import { isStartMode } from '../types'
import { setPgCtlConf, setStartConf, writeEnvironmentFile } from './cluster-files'
import type { ClusterControl } from './cluster-control'
import type { ClusterRegistry } from './cluster-registry'
import { ConfigDocument, editConfFile, readConfFile, replaceVersionCluster } from './conf-file'
import type { ClusterContext } from './context'
import {
  ErrorCodes,
  assertValidClusterName,
  clusterExistsError,
  isErrnoException,
  isMissingFileError,
  logDebug,
  logInfo,
  logWarning,
  usageError,
  validationError,
} from './error-handler'
import { ensureDirectory, moveEntry, pathExists } from './fs-error-utils'
import { injectSuperuserRule, rewriteTrustRules } from './hba'
import type { ProcessManager } from './process-manager'
import { TransactionManager } from './transaction-manager'
import { isValidMajorVersion, majorVersionOf, versionAtLeast } from './version-utils'

export type CreateStep =
  | 'create-config-dir'
  | 'init-data'
  | 'move-config'
  | 'write-control-files'
  | 'auth-rules'
  | 'socket-and-port'
  | 'log-file'
  | 'ssl'
  | 'environment'
  | 'config-overrides'

export const CREATE_STEPS: readonly CreateStep[] = [
  'create-config-dir',
  'init-data',
  'move-config',
  'write-control-files',
  'auth-rules',
  'socket-and-port',
  'log-file',
  'ssl',
  'environment',
  'config-overrides',
]

export type CreateOptions = {
  version: string
  name: string
  owner: Owner
  dataDir?: string
  port?: number
  socketDir?: string
  logFile?: string
  locale?: LocaleSettings
  start?: StartMode
  // "name=value" settings applied last
  config?: string[]
  initdbOptions?: string[]
  walDir?: string
  createclusterConf?: string
  dataChecksums?: boolean
  // pg_ctl options written to pg_ctl.conf
  pgCtlOptions?: string
  startAfter?: boolean
  onProgress?: ProgressCallback
}

export type CreateResult = {
  info: ClusterInfo
  adopted: boolean
}

// createcluster.conf keys that steer creation instead of landing in postgresql.conf
const CREATE_ONLY_KEYS = new Set([
  'create_main_cluster',
  'start_conf',
  'data_directory',
  'waldir',
  'xlogdir',
  'initdb_options',
  'port',
])

const OWNED_FILES = ['postgresql.conf', 'pg_hba.conf', 'pg_ident.conf'] as const

type Plan = {
  version: string
  name: string
  owner: Owner
  ownerName: string
  configDir: string
  confFile: string
  dataDir: string
  port: number
  logFile: string
  customLog: boolean
  startMode: StartMode
  defaults: ConfigMap
  overrides: Array<[string, string]>
  walDir?: string
  initdbOptions: string[]
}

function parseOverride(entry: string): [string, string] {
  const index = entry.indexOf('=')
  if (index <= 0) {
    throw usageError(`invalid configuration setting "${entry}"`, 'Use name=value')
  }
  return [entry.slice(0, index).trim(), entry.slice(index + 1).trim()]
}

function localeArgs(version: string, locale: LocaleSettings = {}): string[] {
  const args: string[] = []
  const add = (flag: string, value: string | undefined) => {
    if (value) args.push(`--${flag}=${value}`)
  }
  add('locale', locale.locale)
  add('lc-collate', locale.lcCollate)
  add('lc-ctype', locale.lcCtype)
  add('lc-messages', locale.lcMessages)
  add('lc-monetary', locale.lcMonetary)
  add('lc-numeric', locale.lcNumeric)
  add('lc-time', locale.lcTime)
  add('encoding', locale.encoding)
  if (versionAtLeast(version, versionFeatures.localeProvider)) {
    add('locale-provider', locale.localeProvider)
    add('icu-locale', locale.icuLocale)
  }
  if (versionAtLeast(version, 16)) {
    add('icu-rules', locale.icuRules)
  }
  return args
}

export class ClusterCreator {
  constructor(
    private readonly ctx: ClusterContext,
    private readonly registry: ClusterRegistry,
    private readonly processes: ProcessManager,
    private readonly control: ClusterControl,
  ) {}

  private get privileged(): boolean {
    return this.ctx.host.identity.isPrivileged()
  }

  private async giveToOwner(path: string, owner: Owner, gid = owner.gid): Promise<void> {
    if (this.privileged) await chown(path, owner.uid, gid)
  }

  /**
   * Checks that need no filesystem change: names, owner, port, settings
   */
  private async plan(options: CreateOptions): Promise<Plan> {
    const { version, name, owner } = options
    if (!isValidMajorVersion(version)) {
      throw validationError(ErrorCodes.INVALID_VERSION, `invalid version "${version}"`, { version })
    }
    assertValidClusterName(name)
    if (await this.registry.exists(version, name)) {
      throw clusterExistsError(version, name)
    }
    if (owner.uid === 0) {
      throw validationError(
        ErrorCodes.OWNERSHIP_INVALID,
        'clusters must not be owned by root',
        { uid: owner.uid },
        'Pass a different owner with --user',
      )
    }
    const account = await this.ctx.host.accounts.userByUid(owner.uid)
    if (!account) {
      throw validationError(
        ErrorCodes.OWNERSHIP_INVALID,
        `user id ${owner.uid} does not exist`,
        { uid: owner.uid },
      )
    }

    const createclusterConf =
      options.createclusterConf ?? this.ctx.paths.commonConfigPath('createcluster.conf')
    const settings = await readConfFile(createclusterConf)
    const substitute = (value: string) => replaceVersionCluster(value, version, name)

    const startMode = options.start ?? settings.start_conf ?? 'auto'
    if (!isStartMode(startMode)) {
      throw validationError(ErrorCodes.START_CONF_INVALID, `invalid start mode "${startMode}"`, {
        startMode,
      })
    }

    const port = await this.registry.claimPort(options.port)

    const dataDir =
      options.dataDir ??
      (settings.data_directory
        ? substitute(settings.data_directory)
        : this.ctx.paths.defaultDataPath(version, name))
    if (!isAbsolute(dataDir)) {
      throw validationError(ErrorCodes.INVALID_ARGUMENTS, `data directory ${dataDir} must be an absolute path`, {
        dataDir,
      })
    }

    const defaultsForConf: ConfigMap = {}
    for (const [key, value] of Object.entries(settings)) {
      if (!CREATE_ONLY_KEYS.has(key)) defaultsForConf[key] = substitute(value)
    }

    const walDir = options.walDir ?? settings.waldir ?? settings.xlogdir
    const configDir = this.ctx.paths.configPath(version, name)

    return {
      version,
      name,
      owner,
      ownerName: account.name,
      configDir,
      confFile: join(configDir, 'postgresql.conf'),
      dataDir,
      port,
      logFile: options.logFile ?? this.ctx.paths.defaultLogPath(version, name),
      customLog: options.logFile !== undefined,
      startMode,
      defaults: defaultsForConf,
      overrides: (options.config ?? []).map(parseOverride),
      walDir: walDir ? substitute(walDir) : undefined,
      initdbOptions: [
        ...(settings.initdb_options ? settings.initdb_options.split(/\s+/).filter(Boolean) : []),
        ...(options.initdbOptions ?? []),
      ],
    }
  }

  /**
   * Major version of an existing cluster in `dataDir`, or null
   */
  private async existingDataVersion(dataDir: string): Promise<string | null> {
    try {
      return majorVersionOf(await readFile(join(dataDir, 'PG_VERSION'), 'utf8'))
    } catch (error) {
      if (isMissingFileError(error)) return null
      throw error
    }
  }

  private initdbArgs(plan: Plan, options: CreateOptions): string[] {
    const args: string[] = []
    if (versionAtLeast(plan.version, versionFeatures.initdbAuthOptions)) {
      args.push('--auth-local', defaults.localAuthMethod, '--auth-host', defaults.hostAuthMethod)
    }
    args.push(...localeArgs(plan.version, options.locale))
    if (plan.walDir) {
      const flag = versionAtLeast(plan.version, versionFeatures.walDirName) ? '--waldir' : '--xlogdir'
      args.push(`${flag}=${plan.walDir}`)
    }
    if (options.dataChecksums === true) {
      args.push('--data-checksums')
    } else if (
      options.dataChecksums === false &&
      versionAtLeast(plan.version, versionFeatures.checksumsDefault)
    ) {
      args.push('--no-data-checksums')
    }
    args.push(...plan.initdbOptions)
    return args
  }

  private async socketDirFor(plan: Plan, requested?: string): Promise<string> {
    if (requested) return requested
    try {
      const rootUid = (await stat(this.ctx.layout.socketRoot)).uid
      return rootUid === plan.owner.uid ? this.ctx.layout.socketRoot : '/tmp'
    } catch (error) {
      if (isMissingFileError(error)) return '/tmp'
      throw error
    }
  }

  /**
   * Whether the owner can read a file, checked under the owner's identity
   */
  private async ownerCanRead(owner: Owner, path: string): Promise<boolean> {
    return this.ctx.host.identity.withIdentity(owner, async () => {
      try {
        await access(path, constants.R_OK)
        return true
      } catch (error) {
        if (isErrnoException(error)) return false
        throw error
      }
    })
  }

  private async nonEmptyFile(path: string): Promise<boolean> {
    try {
      return (await stat(path)).size > 0
    } catch (error) {
      if (isMissingFileError(error)) return false
      throw error
    }
  }

  async create(options: CreateOptions): Promise<CreateResult> {
    const plan = await this.plan(options)
    const report = (stage: CreateStep, message: string) => {
      options.onProgress?.({ stage, message })
    }
    const tx = new TransactionManager()
    let adopted = false

    logInfo(`Creating cluster ${plan.version}/${plan.name}`, {
      dataDir: plan.dataDir,
      port: plan.port,
    })

    try {
      // 3: configuration directory
      await tx.step({
        description: `Create configuration directory ${plan.configDir}`,
        run: async () => {
          report('create-config-dir', `Creating configuration directory ${plan.configDir}`)
          const versionDir = await ensureDirectory(dirname(plan.configDir), {
            mode: fileModes.configDir,
          })
          const created = await ensureDirectory(plan.configDir, {
            owner: this.privileged ? plan.owner : null,
            mode: fileModes.configDir,
          })
          return versionDir ?? created ?? plan.configDir
        },
        undo: (top) => rm(top, { recursive: true, force: true }),
      })

      // 4: adopt or initialize the data directory
      const existingVersion = await this.existingDataVersion(plan.dataDir)
      if (existingVersion !== null) {
        if (existingVersion !== plan.version) {
          throw validationError(
            ErrorCodes.DATA_VERSION_MISMATCH,
            `${plan.dataDir} contains a cluster of version ${existingVersion}, not ${plan.version}`,
            { dataDir: plan.dataDir, found: existingVersion },
          )
        }
        adopted = true
        report('init-data', `Using existing data directory ${plan.dataDir}`)
        const dataStat = await stat(plan.dataDir)
        plan.owner = { uid: dataStat.uid, gid: dataStat.gid }
      } else {
        await tx.step({
          description: `Create data directory ${plan.dataDir}`,
          run: async () => {
            const created = await ensureDirectory(plan.dataDir, {
              owner: this.privileged ? plan.owner : null,
              mode: fileModes.dataDir,
            })
            const wasEmpty = created !== null || (await readdir(plan.dataDir)).length === 0
            return { created, wasEmpty }
          },
          undo: async ({ created, wasEmpty }) => {
            if (created) {
              await rm(created, { recursive: true, force: true })
            } else if (wasEmpty) {
              // the directory was there before; only initdb's output goes
              for (const entry of await readdir(plan.dataDir)) {
                await rm(join(plan.dataDir, entry), { recursive: true, force: true })
              }
            }
          },
        })
        await tx.step({
          description: `Initialize data directory ${plan.dataDir}`,
          run: async () => {
            report('init-data', `Initializing data directory ${plan.dataDir}`)
            await this.processes.initdb(
              plan.version,
              plan.dataDir,
              plan.owner,
              this.initdbArgs(plan, options),
            )
          },
        })
      }

      // 5: move the generated configuration into the config directory
      await tx.step({
        description: 'Move configuration files',
        run: async () => {
          report('move-config', `Moving configuration files to ${plan.configDir}`)
          const moved: string[] = []
          for (const file of OWNED_FILES) {
            const inData = join(plan.dataDir, file)
            const target = join(plan.configDir, file)
            if (await pathExists(inData)) {
              await moveEntry(inData, target)
              moved.push(file)
            } else if (!(await pathExists(target))) {
              await writeFile(target, '')
            }
            await this.giveToOwner(target, plan.owner)
            await chmod(target, file === 'postgresql.conf' ? fileModes.config : fileModes.authConfig)
          }
          await editConfFile(plan.confFile, (doc) => {
            doc.set('data_directory', plan.dataDir)
            doc.set('hba_file', join(plan.configDir, 'pg_hba.conf'))
            doc.set('ident_file', join(plan.configDir, 'pg_ident.conf'))
            doc.set('external_pid_file', join(this.ctx.layout.socketRoot, `${plan.version}-${plan.name}.pid`))
            if (versionAtLeast(plan.version, 9.5)) {
              doc.set('cluster_name', `${plan.version}/${plan.name}`)
            }
            return true
          })
          return moved
        },
        // an adopted data directory gets its files back
        undo: async (moved) => {
          for (const file of moved) {
            await moveEntry(join(plan.configDir, file), join(plan.dataDir, file))
          }
        },
      })

      // 6: start.conf and pg_ctl.conf
      await tx.step({
        description: 'Write start.conf and pg_ctl.conf',
        run: async () => {
          report('write-control-files', `Writing start.conf (${plan.startMode})`)
          await setStartConf(plan.configDir, plan.startMode)
          await setPgCtlConf(plan.configDir, options.pgCtlOptions ?? '')
          await this.giveToOwner(join(plan.configDir, 'start.conf'), plan.owner)
          await this.giveToOwner(join(plan.configDir, 'pg_ctl.conf'), plan.owner)
        },
      })

      // 7: administrative access for freshly initialized clusters
      if (!adopted) {
        await tx.step({
          description: 'Set up pg_hba.conf',
          run: async () => {
            report('auth-rules', 'Adding administrative access rule to pg_hba.conf')
            const hbaPath = join(plan.configDir, 'pg_hba.conf')
            let text = injectSuperuserRule(await readFile(hbaPath, 'utf8'), plan.ownerName)
            if (!versionAtLeast(plan.version, versionFeatures.initdbAuthOptions)) {
              text = rewriteTrustRules(text, defaults.localAuthMethod, defaults.hostAuthMethod)
            }
            await writeFile(hbaPath, text)
          },
        })
      }

      // 8: socket directory and port
      await tx.step({
        description: 'Configure socket directory and port',
        run: async () => {
          const socketDir = await this.socketDirFor(plan, options.socketDir)
          report('socket-and-port', `Using port ${plan.port}, sockets in ${socketDir}`)
          let created: string | null = null
          if (options.socketDir && !defaults.sharedSocketDirs.includes(socketDir)) {
            created = await ensureDirectory(socketDir, {
              owner: this.privileged ? plan.owner : null,
              mode: fileModes.socketDir,
            })
          }
          const key = versionAtLeast(plan.version, versionFeatures.socketDirectories)
            ? 'unix_socket_directories'
            : 'unix_socket_directory'
          await editConfFile(plan.confFile, (doc) => {
            doc.set(key, socketDir)
            doc.set('port', String(plan.port))
            return true
          })
          return created
        },
        undo: async (created) => {
          if (created) await rm(created, { recursive: true, force: true })
        },
      })

      // 9: log file
      await tx.step({
        description: `Create log file ${plan.logFile}`,
        run: async () => {
          report('log-file', `Creating log file ${plan.logFile}`)
          const createdDir = await ensureDirectory(dirname(plan.logFile))
          const existed = await pathExists(plan.logFile)
          if (!existed) await writeFile(plan.logFile, '')
          await this.giveToOwner(plan.logFile, plan.owner, await this.logGroup(plan.owner))
          await chmod(plan.logFile, fileModes.logFile)
          if (plan.customLog) {
            await symlink(plan.logFile, join(plan.configDir, 'log'))
          }
          return { createdDir, created: !existed }
        },
        undo: async ({ createdDir, created }) => {
          if (createdDir) {
            await rm(createdDir, { recursive: true, force: true })
          } else if (created) {
            await rm(plan.logFile, { force: true })
          }
        },
      })

      // 10: SSL from the host's default certificate
      await tx.step({
        description: 'Configure SSL',
        run: async () => {
          await this.configureSsl(plan, report)
        },
      })

      // 11: environment file
      await tx.step({
        description: 'Write environment file',
        run: async () => {
          report('environment', 'Writing environment file')
          await writeEnvironmentFile(
            plan.configDir,
            this.ctx.paths.commonConfigPath('environment'),
            plan.version,
            plan.name,
          )
          await this.giveToOwner(join(plan.configDir, 'environment'), plan.owner)
        },
      })

      // 12: createcluster.conf defaults, then explicit settings
      await tx.step({
        description: 'Apply configuration settings',
        run: async () => {
          report('config-overrides', 'Applying configuration settings')
          const sorted = Object.keys(plan.defaults).sort()
          const entries: Array<[string, string]> = [
            ...sorted.map((key): [string, string] => [key, plan.defaults[key]]),
            ...plan.overrides,
          ]
          for (const [key, value] of entries) {
            if (key === 'include_dir' && !value.includes('/')) {
              await ensureDirectory(join(plan.configDir, value), {
                owner: this.privileged ? plan.owner : null,
                mode: fileModes.configDir,
              })
            }
          }
          if (entries.length > 0) {
            await editConfFile(plan.confFile, (doc: ConfigDocument) => {
              for (const [key, value] of entries) doc.set(key, value)
              return true
            })
          }
        },
      })

      // 13
      tx.commit()
    } catch (error) {
      logWarning(`Creating cluster ${plan.version}/${plan.name} failed, removing it again`)
      await tx.rollback()
      throw error
    }

    logInfo(`Created cluster ${plan.version}/${plan.name}`, {
      steps: tx.getCompletedSteps(),
    })

    let info = await this.registry.describe(plan.version, plan.name)
    if (options.startAfter) {
      await this.control.start(info)
      info = await this.registry.describe(plan.version, plan.name)
    }
    return { info, adopted }
  }

  /**
   * Group for the log file: adm for system accounts when it exists
   */
  private async logGroup(owner: Owner): Promise<number> {
    if (!this.privileged || owner.uid >= defaults.admGroupUidLimit) return owner.gid
    const adm = await this.ctx.host.accounts.groupByName('adm')
    return adm ? adm.gid : owner.gid
  }

  private async configureSsl(
    plan: Plan,
    report: (stage: CreateStep, message: string) => void,
  ): Promise<void> {
    const { sslCertFile, sslKeyFile, commonConfDir } = this.ctx.layout
    if (!(await pathExists(sslCertFile)) || !(await pathExists(sslKeyFile))) {
      logDebug('No default SSL certificate, leaving SSL off')
      return
    }
    if (!(await this.ownerCanRead(plan.owner, sslKeyFile))) {
      logDebug(`${sslKeyFile} is not readable by the cluster owner, leaving SSL off`)
      return
    }

    report('ssl', 'Enabling SSL with the default certificate')
    const settings: Array<[string, string]> = [['ssl', 'on']]
    const caFile = join(commonConfDir, 'root.crt')
    const crlFile = join(commonConfDir, 'root.crl')

    if (versionAtLeast(plan.version, versionFeatures.sslFileSettings)) {
      settings.push(['ssl_cert_file', sslCertFile], ['ssl_key_file', sslKeyFile])
      if (await this.nonEmptyFile(caFile)) settings.push(['ssl_ca_file', caFile])
      if (await this.nonEmptyFile(crlFile)) settings.push(['ssl_crl_file', crlFile])
    } else {
      await symlink(sslCertFile, join(plan.dataDir, 'server.crt'))
      await symlink(sslKeyFile, join(plan.dataDir, 'server.key'))
      if (await this.nonEmptyFile(caFile)) {
        await symlink(caFile, join(plan.dataDir, basename(caFile)))
      }
      if (await this.nonEmptyFile(crlFile)) {
        await symlink(crlFile, join(plan.dataDir, basename(crlFile)))
      }
    }

    await editConfFile(plan.confFile, (doc) => {
      for (const [key, value] of settings) doc.set(key, value)
      return true
    })
  }
}
