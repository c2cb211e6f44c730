export type PortRange = {
  start: number
  end: number
}

export type Defaults = {
  // Port a fresh host's first cluster gets
  port: number
  // Range scanned by the allocator
  portRange: PortRange
  // Lowest and highest port accepted for an explicit --port
  explicitPortRange: PortRange
  // Account owning clusters when create is not told otherwise
  owner: string
  // Cluster name used by createcluster.conf's create_main_cluster
  mainCluster: string
  // Server binary used to detect installed versions
  serverProgram: string
  // Default authentication methods passed to initdb
  localAuthMethod: string
  hostAuthMethod: string
  // Shared socket locations that drop must never remove
  sharedSocketDirs: string[]
  // Log files of clusters owned by a uid below this get the adm group
  admGroupUidLimit: number
  // Depth limit for configuration include expansion
  maxIncludeDepth: number
}

export const defaults: Defaults = {
  port: 5432,
  portRange: { start: 5432, end: 65535 },
  explicitPortRange: { start: 1024, end: 65535 },
  owner: 'postgres',
  mainCluster: 'main',
  serverProgram: 'postgres',
  localAuthMethod: 'peer',
  hostAuthMethod: 'scram-sha-256',
  sharedSocketDirs: ['/tmp', '/var/run/postgresql', '/run/postgresql'],
  admGroupUidLimit: 1000,
  maxIncludeDepth: 10,
}

/**
 * File modes used when writing cluster files
 */
export const fileModes = {
  config: 0o644,
  authConfig: 0o640,
  logFile: 0o640,
  configDir: 0o755,
  dataDir: 0o700,
  socketDir: 0o2775,
} as const

/**
 * First major version for a given on-disk or configuration behaviour
 */
export const versionFeatures = {
  // initdb --auth-local / --auth-host
  initdbAuthOptions: 9.2,
  // ssl_cert_file and friends instead of symlinks in the data directory
  sslFileSettings: 9.2,
  // unix_socket_directories (plural)
  socketDirectories: 9.3,
  // ALTER SYSTEM writes postgresql.auto.conf
  autoConf: 9.4,
  // pg_wal instead of pg_xlog, --waldir instead of --xlogdir
  walDirName: 10,
  // recovery.signal / standby.signal instead of recovery.conf
  recoverySignal: 12,
  // initdb --locale-provider
  localeProvider: 15,
  // data checksums become the initdb default
  checksumsDefault: 18,
} as const
