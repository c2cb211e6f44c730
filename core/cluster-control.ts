import { join } from 'path'
import type { ClusterInfo, StatusResult } from '../types'
import type { ClusterRegistry } from './cluster-registry'
import { readConfFile } from './conf-file'
import { ErrorCodes, logDebug, validationError } from './error-handler'
import type { ProcessManager } from './process-manager'

export type StopMode = 'smart' | 'fast' | 'immediate'

export type StartOptions = {
  // start even when start.conf says disabled
  force?: boolean
  // extra server options, appended after the config_file option
  serverOptions?: string[]
}

/**
 * Starts and stops cluster servers through pg_ctl
 */
export class ClusterControl {
  constructor(
    private readonly registry: ClusterRegistry,
    private readonly processes: ProcessManager,
  ) {}

  private async pgCtlOptions(info: ClusterInfo): Promise<string[]> {
    const conf = await readConfFile(join(info.configDir, 'pg_ctl.conf'))
    const options = conf.pg_ctl_options?.trim()
    return options ? options.split(/\s+/) : []
  }

  async start(info: ClusterInfo, options: StartOptions = {}): Promise<void> {
    if (info.start === 'disabled' && !options.force) {
      throw validationError(
        ErrorCodes.START_DISABLED,
        `cluster ${info.version}/${info.name} is disabled in start.conf`,
        { version: info.version, cluster: info.name },
        'Edit start.conf or pass --force',
      )
    }
    if (info.running) {
      throw validationError(
        ErrorCodes.CLUSTER_RUNNING,
        `cluster ${info.version}/${info.name} is already running`,
        { version: info.version, cluster: info.name },
      )
    }
    await this.registry.validateOwnership(info)
    if (!info.dataDir) return

    const serverOptions = [
      `-c config_file="${join(info.configDir, 'postgresql.conf')}"`,
      ...(options.serverOptions ?? []),
    ].join(' ')

    await this.processes.pgCtl(info, 'start', [
      '-w',
      '-D',
      info.dataDir,
      '-l',
      info.logFile,
      '-s',
      '-o',
      serverOptions,
      ...(await this.pgCtlOptions(info)),
    ])
    logDebug(`Started cluster ${info.version}/${info.name}`, { port: info.port })
  }

  async stop(info: ClusterInfo, mode: StopMode = 'fast'): Promise<void> {
    if (!info.running) {
      throw validationError(
        ErrorCodes.CLUSTER_NOT_RUNNING,
        `cluster ${info.version}/${info.name} is not running`,
        { version: info.version, cluster: info.name },
      )
    }
    if (!info.dataDir) return
    await this.processes.pgCtl(info, 'stop', ['-w', '-s', '-D', info.dataDir, '-m', mode])
    logDebug(`Stopped cluster ${info.version}/${info.name}`, { mode })
  }

  /**
   * Stop when running, then start; returns the fresh description
   */
  async restart(info: ClusterInfo, options: StartOptions = {}): Promise<ClusterInfo> {
    if (info.running) {
      await this.stop(info)
    }
    const stopped = await this.registry.describe(info.version, info.name)
    await this.start(stopped, options)
    return this.registry.describe(info.version, info.name)
  }

  async status(info: ClusterInfo): Promise<StatusResult> {
    if (!info.dataDir) {
      return { running: false, message: 'data directory unknown' }
    }
    const result = await this.processes.pgCtl(info, 'status', ['-D', info.dataDir])
    return {
      running: result.code === 0,
      message: (result.stdout || result.stderr).trim(),
    }
  }
}
