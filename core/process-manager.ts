import type { ClusterInfo, LocaleSettings, Owner, ProcessResult } from '../types'
import type { ClusterContext } from './context'
import type { ClusterRegistry } from './cluster-registry'
import { ErrorCodes, PgClusterError, logDebug } from './error-handler'
import type { Invocation, SpawnOptions } from './spawn-utils'
import { versionAtLeast } from './version-utils'

const PREEXISTING_DATABASES = ['template1', 'postgres']

export type PgCtlAction = 'start' | 'stop' | 'restart' | 'reload' | 'status'

export type PsqlTarget = {
  version: string
  socketDir: string
  port: number
  owner: Owner
}

/**
 * Runs the PostgreSQL programs of a given version through the context's
 * CommandRunner, as the cluster owner where that matters
 */
export class ProcessManager {
  constructor(
    private readonly ctx: ClusterContext,
    private readonly registry: ClusterRegistry,
  ) {}

  /**
   * Spawn options that make the child run as `owner` when we are root
   */
  asOwner(owner: Owner, options: SpawnOptions = {}): SpawnOptions {
    if (!this.ctx.host.identity.isPrivileged()) return options
    return { ...options, uid: owner.uid, gid: owner.gid }
  }

  async run(
    program: string,
    version: string,
    args: string[],
    options?: SpawnOptions,
  ): Promise<ProcessResult> {
    const path = await this.registry.requireProgram(program, version)
    const result = await this.ctx.host.runner.run(path, args, options)
    logDebug(`${program} completed`, { version, exitCode: result.exitCode })
    return { stdout: result.stdout, stderr: result.stderr, code: result.exitCode }
  }

  /**
   * Run a program that is not tied to a server version (tar, hooks)
   */
  async runTool(
    command: string,
    args: string[],
    options?: SpawnOptions,
  ): Promise<ProcessResult> {
    const result = await this.ctx.host.runner.run(command, args, options)
    return { stdout: result.stdout, stderr: result.stderr, code: result.exitCode }
  }

  async initdb(
    version: string,
    dataDir: string,
    owner: Owner,
    args: string[],
  ): Promise<ProcessResult> {
    return this.run('initdb', version, ['-D', dataDir, ...args], this.asOwner(owner))
  }

  async pgCtl(
    info: ClusterInfo,
    action: PgCtlAction,
    args: string[],
  ): Promise<ProcessResult> {
    const owner = ownerOf(info)
    return this.run('pg_ctl', info.version, [action, ...args], {
      ...this.asOwner(owner),
      allowFailure: action === 'status',
    })
  }

  /**
   * pg_controldata output as a "label: value" mapping
   */
  async controlData(version: string, dataDir: string): Promise<Record<string, string>> {
    const { stdout } = await this.run('pg_controldata', version, [dataDir], {
      env: { LC_ALL: 'C', LANG: 'C', LANGUAGE: '' },
    })
    const data: Record<string, string> = {}
    for (const line of stdout.split('\n')) {
      if (!line.trim()) continue
      const match = /^(.+?):\s*(.*)$/.exec(line)
      if (!match) {
        throw new PgClusterError(
          ErrorCodes.TOOL_FAILED,
          `Invalid pg_controldata output: ${line}`,
          'external-tool',
        )
      }
      data[match[1]] = match[2]
    }
    return data
  }

  psqlArgs(target: PsqlTarget, ...args: string[]): string[] {
    return ['-h', target.socketDir, '-p', String(target.port), ...args]
  }

  /**
   * Run one statement, unaligned and tuples-only; returns trimmed output
   */
  async query(target: PsqlTarget, sql: string, database = 'template1'): Promise<string> {
    const { stdout } = await this.run(
      'psql',
      target.version,
      this.psqlArgs(target, '-AXtc', sql, database),
      this.asOwner(target.owner, { env: { LC_ALL: 'C' } }),
    )
    return stdout.replace(/\n$/, '')
  }

  /**
   * Feed a script to psql; stops at the first error
   */
  async runScript(target: PsqlTarget, script: string, database = 'postgres'): Promise<void> {
    await this.run(
      'psql',
      target.version,
      this.psqlArgs(target, '-X', '-q', '-v', 'ON_ERROR_STOP=1', '-d', database),
      this.asOwner(target.owner, { input: script, env: { LC_ALL: 'C' } }),
    )
  }

  /**
   * Database names from `psql -l`
   */
  async listDatabases(target: PsqlTarget): Promise<string[]> {
    const { stdout } = await this.run(
      'psql',
      target.version,
      this.psqlArgs(target, '-AXtl'),
      this.asOwner(target.owner, { env: { LC_ALL: 'C' } }),
    )
    return stdout
      .split('\n')
      .map((line) => line.split('|'))
      // continuation lines of wrapped access privileges have fewer fields
      .filter((fields) => fields.length >= 3)
      .map((fields) => fields[0])
  }

  /**
   * Encoding and locale settings of a database
   */
  async databaseLocales(target: PsqlTarget, database = 'template1'): Promise<LocaleSettings> {
    const encoding = await this.query(target, 'SELECT getdatabaseencoding()', database)
    const [lcCtype, lcCollate] = (
      await this.query(
        target,
        'SELECT datctype, datcollate FROM pg_database WHERE datname = current_database()',
        database,
      )
    ).split('|')
    const locales: LocaleSettings = { encoding, lcCtype, lcCollate }

    if (versionAtLeast(target.version, 15)) {
      const rulesColumn = versionAtLeast(target.version, 16) ? ', daticurules' : ''
      const [provider, icuLocale, icuRules] = (
        await this.query(
          target,
          `SELECT CASE datlocprovider::text WHEN 'c' THEN 'libc' WHEN 'i' THEN 'icu' WHEN 'b' THEN 'builtin' END, daticulocale${rulesColumn} FROM pg_database WHERE datname = current_database()`,
          database,
        )
      ).split('|')
      locales.localeProvider = provider || undefined
      locales.icuLocale = icuLocale || undefined
      locales.icuRules = icuRules || undefined
    }
    return locales
  }

  /**
   * Stream pg_dump of one database straight into pg_restore on the target.
   * Databases initdb already made (template1, postgres) are restored in
   * place, all others with --create.
   */
  async dumpInto(source: PsqlTarget, target: PsqlTarget, database: string): Promise<void> {
    const producer: Invocation = {
      command: await this.registry.requireProgram('pg_dump', target.version),
      args: this.psqlArgs(source, '-Fc', '--quote-all-identifiers', database),
      options: this.asOwner(source.owner),
    }
    const consumer: Invocation = {
      command: await this.registry.requireProgram('pg_restore', target.version),
      args: this.psqlArgs(target, ...restoreArgs(database)),
      options: this.asOwner(target.owner),
    }
    await this.ctx.host.runner.pipe(producer, consumer)
  }

  /**
   * Restore a custom-format dump file, with the same database handling
   * as dumpInto
   */
  async restoreFile(target: PsqlTarget, file: string, database: string): Promise<void> {
    await this.run(
      'pg_restore',
      target.version,
      this.psqlArgs(target, ...restoreArgs(database), file),
      this.asOwner(target.owner),
    )
  }
}

function restoreArgs(database: string): string[] {
  return PREEXISTING_DATABASES.includes(database)
    ? ['--exit-on-error', '-d', database]
    : ['--create', '--exit-on-error', '-d', 'template1']
}

export function ownerOf(info: ClusterInfo): Owner {
  if (info.ownerUid === null || info.ownerGid === null) {
    throw new PgClusterError(
      ErrorCodes.OWNERSHIP_INVALID,
      `Could not determine owner of cluster ${info.version}/${info.name}`,
      'validation',
    )
  }
  return { uid: info.ownerUid, gid: info.ownerGid }
}

export function psqlTarget(info: ClusterInfo): PsqlTarget {
  return {
    version: info.version,
    socketDir: info.socketDir,
    port: info.port,
    owner: ownerOf(info),
  }
}
