/**
 * Startup behaviour recorded in a cluster's start.conf
 */
export type StartMode = 'auto' | 'manual' | 'disabled'

export const START_MODES: readonly StartMode[] = ['auto', 'manual', 'disabled']

export function isStartMode(value: string): value is StartMode {
  return (START_MODES as readonly string[]).includes(value)
}

/**
 * A flat key/value view of a configuration document after include merging
 */
export type ConfigMap = Record<string, string>

/**
 * Numeric uid/gid pair that owns a cluster
 */
export type Owner = {
  uid: number
  gid: number
}

export type ClusterRef = {
  version: string
  name: string
}

/**
 * Everything the registry knows about a cluster, assembled from the
 * filesystem on every call
 */
export type ClusterInfo = ClusterRef & {
  configDir: string
  // uid owning postgresql.conf
  configUid: number | null
  config: ConfigMap
  dataDir: string | null
  walDir: string | null
  socketDir: string
  port: number
  running: boolean
  recovery: boolean
  ownerUid: number | null
  ownerGid: number | null
  start: StartMode
  logFile: string
  customLog: boolean
}

export type ProgressCallback = (progress: {
  stage: string
  message: string
}) => void

export type ProcessResult = {
  stdout: string
  stderr: string
  code?: number
}

export type StatusResult = {
  running: boolean
  message: string
}

/**
 * Ways a cluster can be moved to a new major version
 */
export type UpgradeMethod = 'dump' | 'upgrade' | 'link' | 'clone'

export const UPGRADE_METHODS: readonly UpgradeMethod[] = [
  'dump',
  'upgrade',
  'link',
  'clone',
]

export type LocaleSettings = {
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

export type BackupKind = 'dump' | 'backup'

export type BackupStatus = {
  type: BackupKind
  start: string
  end?: string
  duration?: string
  status: 'running' | 'ok' | 'failed'
}

export type BackupEntry = {
  path: string
  kind: BackupKind
  timestamp: string
  status: BackupStatus | null
}
