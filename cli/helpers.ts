import type { Command } from 'commander'
import { defaults } from '../config/defaults'
import { BackupManager } from '../core/backup-manager'
import { ClusterControl } from '../core/cluster-control'
import { ClusterCreator } from '../core/cluster-creator'
import { ClusterManager } from '../core/cluster-manager'
import { ClusterRegistry } from '../core/cluster-registry'
import { ClusterUpgrader } from '../core/cluster-upgrade'
import { createContext, type ClusterContext } from '../core/context'
import {
  ErrorCodes,
  PgClusterError,
  clusterNotFoundError,
  recordPgClusterError,
  usageError,
  validationError,
} from '../core/error-handler'
import { currentUid } from '../core/platform-service'
import { ProcessManager } from '../core/process-manager'
import { RestoreManager } from '../core/restore-manager'
import type { ClusterInfo, ClusterRef, LocaleSettings, Owner } from '../types'
import { promptClusterSelect } from './ui/prompts'
import { uiError } from './ui/theme'

export type Services = {
  ctx: ClusterContext
  registry: ClusterRegistry
  processes: ProcessManager
  control: ClusterControl
  creator: ClusterCreator
  manager: ClusterManager
  upgrader: ClusterUpgrader
  backups: BackupManager
  restores: RestoreManager
}

/**
 * Wire every component to one context
 */
export function createServices(ctx: ClusterContext): Services {
  const registry = new ClusterRegistry(ctx)
  const processes = new ProcessManager(ctx, registry)
  const control = new ClusterControl(registry, processes)
  const creator = new ClusterCreator(ctx, registry, processes, control)
  const manager = new ClusterManager(ctx, registry, control)
  return {
    ctx,
    registry,
    processes,
    control,
    creator,
    manager,
    upgrader: new ClusterUpgrader(ctx, registry, processes, control, creator, manager),
    backups: new BackupManager(ctx, processes),
    restores: new RestoreManager(ctx, registry, processes, control, creator, manager),
  }
}

let services: Services | null = null

/**
 * Services for the running process, built on first use from the
 * environment
 */
export function getServices(): Services {
  if (!services) {
    services = createServices(createContext())
  }
  return services
}

/**
 * Print the one-line error, record it in the log file and exit 1
 */
export function exitWithError(error: unknown): never {
  const pgError = PgClusterError.from(error)
  recordPgClusterError(pgError)
  console.error(uiError(pgError.message))
  process.exit(1)
}

/**
 * Accumulator for repeatable options
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value]
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw usageError(`invalid number "${value}"`)
  }
  return Number(value)
}

/**
 * Owner for new clusters: --user/--group when given, else the default
 * cluster account when running as root, else the invoking user
 */
export async function resolveOwner(
  ctx: ClusterContext,
  user?: string,
  group?: string,
): Promise<Owner> {
  const { accounts, identity } = ctx.host
  let owner: Owner

  if (user !== undefined || identity.isPrivileged()) {
    const name = user ?? defaults.owner
    const account = /^\d+$/.test(name)
      ? await accounts.userByUid(Number(name))
      : await accounts.userByName(name)
    if (!account) {
      throw validationError(ErrorCodes.OWNERSHIP_INVALID, `unknown user "${name}"`, { user: name })
    }
    owner = { uid: account.uid, gid: account.gid }
  } else {
    owner = { uid: currentUid(), gid: process.getegid ? process.getegid() : -1 }
  }

  if (group !== undefined) {
    const entry = /^\d+$/.test(group)
      ? await accounts.groupByGid(Number(group))
      : await accounts.groupByName(group)
    if (!entry) {
      throw validationError(ErrorCodes.OWNERSHIP_INVALID, `unknown group "${group}"`, { group })
    }
    owner = { ...owner, gid: entry.gid }
  }

  return owner
}

/**
 * The cluster named on the command line, or one picked interactively
 * when both arguments are missing and stdin is a terminal
 */
export async function resolveCluster(
  registry: ClusterRegistry,
  version: string | undefined,
  name: string | undefined,
  message: string,
): Promise<ClusterRef | null> {
  if (version !== undefined && name !== undefined) {
    return { version, name }
  }
  if (version !== undefined || !process.stdin.isTTY) {
    throw usageError('version and cluster name are required', 'Usage: <version> <cluster>')
  }
  return promptClusterSelect(await registry.listAll(), message)
}

/**
 * Describe a cluster named on the command line
 */
export async function describeCluster(
  registry: ClusterRegistry,
  cluster: ClusterRef,
): Promise<ClusterInfo> {
  if (!(await registry.exists(cluster.version, cluster.name))) {
    throw clusterNotFoundError(cluster.version, cluster.name)
  }
  return registry.describe(cluster.version, cluster.name)
}

export type LocaleOptions = {
  locale?: string
  lcCollate?: string
  lcCtype?: string
  lcMessages?: string
  lcMonetary?: string
  lcNumeric?: string
  lcTime?: string
  encoding?: string
  localeProvider?: string
  icuLocale?: string
  icuRules?: string
}

/**
 * Locale options shared by create and upgrade, without unset entries
 */
export function localeFromOptions(options: LocaleOptions): LocaleSettings {
  const locale: LocaleSettings = {}
  const keys = [
    'locale',
    'lcCollate',
    'lcCtype',
    'lcMessages',
    'lcMonetary',
    'lcNumeric',
    'lcTime',
    'encoding',
    'localeProvider',
    'icuLocale',
    'icuRules',
  ] as const
  for (const key of keys) {
    const value = options[key]
    if (value !== undefined) locale[key] = value
  }
  return locale
}

/**
 * Add the locale options to a command
 */
export function withLocaleOptions(command: Command): Command {
  return command
    .option('--locale <locale>', 'Locale for all categories')
    .option('--lc-collate <locale>', 'LC_COLLATE')
    .option('--lc-ctype <locale>', 'LC_CTYPE')
    .option('--lc-messages <locale>', 'LC_MESSAGES')
    .option('--lc-monetary <locale>', 'LC_MONETARY')
    .option('--lc-numeric <locale>', 'LC_NUMERIC')
    .option('--lc-time <locale>', 'LC_TIME')
    .option('-e, --encoding <encoding>', 'Database encoding')
    .option('--locale-provider <provider>', 'libc, icu or builtin (15 and later)')
    .option('--icu-locale <locale>', 'ICU locale (15 and later)')
    .option('--icu-rules <rules>', 'ICU collation rules (16 and later)')
}
