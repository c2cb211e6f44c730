/**
 * Cluster Registry
 *
 * Discovers and describes clusters by walking the configuration and data
 * trees. Nothing is cached: every call looks at the filesystem again.
 */

import net from 'net'
import { access, constants, lstat, readFile, readdir, readlink, stat } from 'fs/promises'
import { dirname, join } from 'path'
import { defaults, versionFeatures } from '../config/defaults'
import type { ClusterInfo, ConfigMap } from '../types'
import { getStartConf } from './cluster-files'
import { readConfFile } from './conf-file'
import type { ClusterContext } from './context'
import {
  ErrorCodes,
  PgClusterError,
  filesystemError,
  isErrnoException,
  isMissingFileError,
  logDebug,
  portInUseError,
  toolNotFoundError,
  validationError,
} from './error-handler'
import { pathExists } from './fs-error-utils'
import { PortAllocator, assertValidExplicitPort } from './port-manager'
import { compareVersions, isValidMajorVersion, sortVersions, versionAtLeast } from './version-utils'

export async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK)
    return (await stat(path)).isFile()
  } catch (error) {
    if (isErrnoException(error)) return false
    throw error
  }
}

async function listDirectory(path: string): Promise<string[]> {
  try {
    return await readdir(path)
  } catch (error) {
    if (isMissingFileError(error)) return []
    throw error
  }
}

async function readLinkIfSymlink(path: string): Promise<string | null> {
  try {
    if (!(await lstat(path)).isSymbolicLink()) return null
    return await readlink(path)
  } catch (error) {
    if (isMissingFileError(error)) return null
    throw error
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch (error) {
    if (isMissingFileError(error)) return false
    throw error
  }
}

/**
 * Errors a concurrently vanishing cluster can produce while scanning
 */
function isRaceError(error: unknown): boolean {
  if (isMissingFileError(error)) return true
  return (
    error instanceof PgClusterError &&
    (error.code === ErrorCodes.CLUSTER_INFO_MISSING ||
      error.code === ErrorCodes.FILE_NOT_FOUND)
  )
}

export class ClusterRegistry {
  private readonly allocator: PortAllocator

  constructor(private readonly ctx: ClusterContext) {
    this.allocator = new PortAllocator(ctx.host.portProbe)
  }

  /**
   * Versions with an executable `program`, plus (for the server program)
   * versions that still have a configured cluster
   */
  async listVersions(
    program: string = defaults.serverProgram,
    maxVersion?: string,
  ): Promise<string[]> {
    const versions = new Set<string>()
    const inRange = (version: string) =>
      isValidMajorVersion(version) &&
      (maxVersion === undefined || compareVersions(version, maxVersion) <= 0)

    for (const entry of await listDirectory(this.ctx.layout.binRoot)) {
      if (!inRange(entry)) continue
      if (await this.programPath(program, entry)) versions.add(entry)
    }

    if (program === defaults.serverProgram) {
      for (const entry of await listDirectory(this.ctx.layout.confRoot)) {
        if (!inRange(entry) || versions.has(entry)) continue
        const versionDir = this.ctx.paths.versionConfigPath(entry)
        for (const cluster of await listDirectory(versionDir)) {
          if (await isFile(join(versionDir, cluster, 'postgresql.conf'))) {
            versions.add(entry)
            break
          }
        }
      }
    }

    return sortVersions(versions)
  }

  async newestVersion(program?: string): Promise<string | null> {
    const versions = await this.listVersions(program)
    return versions.length > 0 ? versions[versions.length - 1] : null
  }

  /**
   * Clusters of a version; a dangling postgresql.conf symlink still counts
   */
  async listClusters(version: string): Promise<string[]> {
    const versionDir = this.ctx.paths.versionConfigPath(version)
    const clusters: string[] = []
    for (const entry of await listDirectory(versionDir)) {
      if (await pathExists(join(versionDir, entry, 'postgresql.conf'))) {
        clusters.push(entry)
      }
    }
    return clusters.sort()
  }

  async exists(version: string, cluster: string): Promise<boolean> {
    return (await this.listClusters(version)).includes(cluster)
  }

  /**
   * Path of a versioned program, the newest version's by default
   */
  async programPath(program: string, version?: string): Promise<string | null> {
    const resolved = version ?? (await this.newestVersion(program))
    if (!resolved) return null
    const path = this.ctx.paths.programPath(program, resolved)
    return (await isExecutable(path)) ? path : null
  }

  /**
   * Like programPath, but missing programs are an error
   */
  async requireProgram(program: string, version: string): Promise<string> {
    const path = await this.programPath(program, version)
    if (!path) throw toolNotFoundError(program, version)
    return path
  }

  /**
   * Where a named configuration file of a cluster lives: the cluster's
   * config directory, else the common one; postgresql.auto.conf lives in
   * the data directory
   */
  async confFilePath(version: string, cluster: string, file: string): Promise<string | null> {
    if (file === 'postgresql.auto.conf') {
      const dataDir = await this.dataDirectory(version, cluster)
      return dataDir ? join(dataDir, file) : null
    }
    const path = this.ctx.paths.configFilePath(version, cluster, file)
    return (await pathExists(path)) ? path : this.ctx.paths.commonConfigPath(file)
  }

  /**
   * Settings of a cluster configuration file. For postgresql.conf the
   * ALTER SYSTEM overrides of postgresql.auto.conf are merged on top.
   */
  async readClusterConf(version: string, cluster: string, file: string): Promise<ConfigMap> {
    const path = await this.confFilePath(version, cluster, file)
    if (!path) return {}
    const conf = await readConfFile(path)

    if (file === 'postgresql.conf' && versionAtLeast(version, versionFeatures.autoConf)) {
      const dataDir = await this.dataDirectory(version, cluster, conf)
      if (dataDir) {
        const autoConf = await this.readAutoConf(join(dataDir, 'postgresql.auto.conf'))
        for (const [key, value] of Object.entries(autoConf)) {
          // ALTER SYSTEM cannot set data_directory
          if (key === 'data_directory') continue
          conf[key] = value
        }
      }
    }

    return conf
  }

  private async readAutoConf(path: string): Promise<ConfigMap> {
    try {
      return await readConfFile(path)
    } catch (error) {
      // the data directory is only readable by its owner
      if (isErrnoException(error) && error.code === 'EACCES') {
        logDebug(`Cannot read ${path}`, { errno: error.code })
        return {}
      }
      throw error
    }
  }

  /**
   * data_directory setting, else the legacy pgdata symlink, else a
   * configuration directory that is itself (a link to) the data directory
   */
  async dataDirectory(version: string, cluster: string, conf?: ConfigMap): Promise<string | null> {
    const configDir = this.ctx.paths.configPath(version, cluster)
    const settings = conf ?? (await readConfFile(join(configDir, 'postgresql.conf')))

    if (settings.data_directory) return settings.data_directory

    const legacyLink = await readLinkIfSymlink(join(configDir, 'pgdata'))
    if (legacyLink) return legacyLink

    if (await isFile(join(configDir, 'PG_VERSION'))) {
      return (await readLinkIfSymlink(configDir)) ?? configDir
    }

    return null
  }

  /**
   * First configured socket directory, else the shared socket root when
   * it belongs to the data directory's owner, else /tmp. The socket root
   * must exist unless a directory is configured.
   */
  async socketDirectory(version: string, cluster: string, conf?: ConfigMap): Promise<string> {
    const settings = conf ?? (await this.readClusterConf(version, cluster, 'postgresql.conf'))
    const key = versionAtLeast(version, versionFeatures.socketDirectories)
      ? 'unix_socket_directories'
      : 'unix_socket_directory'
    const configured = settings[key]?.replace(/\s*,.*/, '')
    if (configured) return configured

    const socketRoot = this.ctx.layout.socketRoot
    let rootUid: number
    try {
      rootUid = (await stat(socketRoot)).uid
    } catch (error) {
      throw filesystemError(`Cannot stat ${socketRoot}`, socketRoot, error)
    }

    const dataDir = await this.dataDirectory(version, cluster, settings)
    if (!dataDir) {
      throw validationError(
        ErrorCodes.CLUSTER_INFO_MISSING,
        `Invalid data directory for cluster ${version} ${cluster}`,
        { version, cluster },
      )
    }
    let dataUid: number
    try {
      dataUid = (await stat(dataDir)).uid
    } catch (error) {
      throw filesystemError(
        `${dataDir} is not accessible; please fix the directory permissions (${dirname(dataDir)}/ should be world readable)`,
        dataDir,
        error,
      )
    }

    return rootUid === dataUid ? socketRoot : '/tmp'
  }

  /**
   * Whether something accepts connections on the cluster's Unix socket
   */
  async portRunning(socketDir: string, port: number): Promise<boolean> {
    const socketPath = join(socketDir, `.s.PGSQL.${port}`)
    try {
      if (!(await lstat(socketPath)).isSocket()) return false
    } catch (error) {
      if (isErrnoException(error)) return false
      throw error
    }

    return new Promise((resolve) => {
      const socket = net.createConnection({ path: socketPath })
      socket.once('connect', () => {
        socket.destroy()
        resolve(true)
      })
      socket.once('error', () => {
        socket.destroy()
        resolve(false)
      })
    })
  }

  /**
   * PID from the first line of a pid file; null when unreadable
   */
  async readPidFile(path: string): Promise<number | null> {
    let text: string
    try {
      text = await readFile(path, 'utf8')
    } catch (error) {
      if (isErrnoException(error)) return null
      throw error
    }
    const match = /^(\d+)\s*$/.exec(text.split('\n')[0] ?? '')
    return match ? Number(match[1]) : null
  }

  /**
   * true/false when the pid file settles it, null when it cannot tell
   * (the server leaves a stale pid file behind and only root may read it)
   */
  async checkPidFileRunning(path: string): Promise<boolean | null> {
    if (!(await pathExists(path))) return false
    const pid = await this.readPidFile(path)
    if (pid === null) return null
    const argv = await this.ctx.host.processes.commandLine(pid)
    if (argv === null) return null
    return /\bpostgres\b/.test(argv.join(' '))
  }

  /**
   * Full description of one cluster
   */
  async describe(version: string, cluster: string): Promise<ClusterInfo> {
    const configDir = this.ctx.paths.configPath(version, cluster)
    const confPath = join(configDir, 'postgresql.conf')

    let configUid: number
    try {
      configUid = (await stat(confPath)).uid
    } catch (error) {
      if (!isErrnoException(error)) throw error
      throw validationError(
        ErrorCodes.CLUSTER_INFO_MISSING,
        `cluster ${version}/${cluster} has no readable postgresql.conf`,
        { version, cluster, path: confPath, errno: error.code },
      )
    }

    const config = await this.readClusterConf(version, cluster, 'postgresql.conf')
    const dataDir = await this.dataDirectory(version, cluster, config)
    const port = Number(config.port) || defaults.port
    const socketDir = await this.socketDirectory(version, cluster, config)

    let running: boolean | null = null
    const pidFile = config.external_pid_file
    if (pidFile && pidFile !== '(none)') {
      running = await this.checkPidFileRunning(pidFile)
    }
    // the port may have been edited since the server started
    if (running === null) {
      running = await this.portRunning(socketDir, port)
    }

    let ownerUid: number | null = null
    let ownerGid: number | null = null
    let recovery = false
    let walDir: string | null = null
    if (dataDir) {
      try {
        const dataStat = await stat(dataDir)
        ownerUid = dataStat.uid
        ownerGid = dataStat.gid
      } catch (error) {
        if (!isErrnoException(error)) throw error
        logDebug(`Cannot stat data directory ${dataDir}`, { errno: error.code })
      }
      const markers = versionAtLeast(version, versionFeatures.recoverySignal)
        ? ['recovery.signal', 'standby.signal']
        : ['recovery.conf']
      for (const marker of markers) {
        if (await pathExists(join(dataDir, marker))) recovery = true
      }
      const walName = versionAtLeast(version, versionFeatures.walDirName) ? 'pg_wal' : 'pg_xlog'
      walDir = await readLinkIfSymlink(join(dataDir, walName))
    }

    const logLink = await readLinkIfSymlink(join(configDir, 'log'))

    return {
      version,
      name: cluster,
      configDir,
      configUid,
      config,
      dataDir,
      walDir,
      socketDir,
      port,
      running,
      recovery,
      ownerUid,
      ownerGid,
      start: await getStartConf(configDir),
      logFile: logLink ?? this.ctx.paths.defaultLogPath(version, cluster),
      customLog: logLink !== null,
    }
  }

  /**
   * The data directory must exist and belong to a real, non-root account;
   * when privileged, postgresql.conf must belong to that account or root
   */
  async validateOwnership(info: ClusterInfo): Promise<void> {
    const fail = (message: string) =>
      validationError(ErrorCodes.OWNERSHIP_INVALID, message, {
        version: info.version,
        cluster: info.name,
      })

    if (!info.dataDir) throw fail('Cluster data directory is unknown')
    let isDirectory = false
    try {
      isDirectory = (await stat(info.dataDir)).isDirectory()
    } catch (error) {
      if (!isErrnoException(error)) throw error
    }
    if (!isDirectory) {
      throw fail(`${info.dataDir} is not accessible or does not exist`)
    }
    if (info.ownerUid === null || info.ownerGid === null) {
      throw fail(`Could not determine owner of ${info.dataDir}`)
    }
    if (info.ownerUid === 0) {
      throw fail(`Data directory ${info.dataDir} must not be owned by root`)
    }

    const { accounts, identity } = this.ctx.host
    const owner = await accounts.userByUid(info.ownerUid)
    if (!owner) {
      throw fail(`The cluster is owned by user id ${info.ownerUid} which does not exist`)
    }
    if (!(await accounts.groupByGid(info.ownerGid))) {
      throw fail(`The cluster is owned by group id ${info.ownerGid} which does not exist`)
    }

    if (
      identity.isPrivileged() &&
      info.configUid !== null &&
      info.configUid !== 0 &&
      info.configUid !== info.ownerUid
    ) {
      const configOwner = (await accounts.userByUid(info.configUid))?.name ?? '(unknown)'
      throw fail(
        `Config owner (${configOwner}:${info.configUid}) and data owner (${owner.name}:${info.ownerUid}) do not match, and config owner is not root`,
      )
    }
  }

  /**
   * Every cluster of every known version, described. Clusters that vanish
   * or lose their configuration mid-scan are skipped.
   */
  async listAll(): Promise<ClusterInfo[]> {
    const result: ClusterInfo[] = []
    for (const version of await this.listVersions()) {
      for (const cluster of await this.listClusters(version)) {
        try {
          result.push(await this.describe(version, cluster))
        } catch (error) {
          if (!isRaceError(error)) throw error
          logDebug(`Skipping ${version}/${cluster} during scan`, {
            error: error instanceof Error ? error.message : String(error),
          })
        }
      }
    }
    return result
  }

  /**
   * Ports claimed by configured clusters, mapped to "version/cluster"
   */
  async collectPorts(): Promise<Map<number, string>> {
    const ports = new Map<number, string>()
    for (const version of await this.listVersions()) {
      for (const cluster of await this.listClusters(version)) {
        try {
          const conf = await this.readClusterConf(version, cluster, 'postgresql.conf')
          ports.set(Number(conf.port) || defaults.port, `${version}/${cluster}`)
        } catch (error) {
          if (!isRaceError(error)) throw error
          logDebug(`Skipping ${version}/${cluster} while collecting ports`)
        }
      }
    }
    return ports
  }

  async nextFreePort(): Promise<number> {
    const claimed = await this.collectPorts()
    return this.allocator.nextFreePort(claimed.keys())
  }

  /**
   * Port for a new cluster: the requested one when no cluster has it,
   * otherwise the next free one
   */
  async claimPort(requested?: number): Promise<number> {
    const claimed = await this.collectPorts()
    if (requested === undefined) {
      return this.allocator.nextFreePort(claimed.keys())
    }
    assertValidExplicitPort(requested)
    const holder = claimed.get(requested)
    if (holder) throw portInUseError(requested, holder)
    return requested
  }
}
