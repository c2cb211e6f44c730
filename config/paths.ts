import { join } from 'path'

/**
 * Filesystem roots for one process. Built once at startup and handed to
 * every component; nothing reads the environment after that.
 */
export type ClusterLayout = {
  // Per-cluster configuration: <confRoot>/<version>/<cluster>/
  confRoot: string
  // createcluster.conf, environment template, hook directories
  commonConfDir: string
  // Server binaries: <binRoot>/<version>/bin/<program>
  binRoot: string
  // Default data directories: <dataRoot>/<version>/<cluster>
  dataRoot: string
  logRoot: string
  socketRoot: string
  backupRoot: string
  sslCertFile: string
  sslKeyFile: string
}

export type LayoutEnv = Partial<Record<string, string>>

export const defaultLayout: ClusterLayout = {
  confRoot: '/etc/postgresql',
  commonConfDir: '/etc/postgresql-common',
  binRoot: '/usr/lib/postgresql',
  dataRoot: '/var/lib/postgresql',
  logRoot: '/var/log/postgresql',
  socketRoot: '/var/run/postgresql',
  backupRoot: '/var/backups/postgresql',
  sslCertFile: '/etc/ssl/certs/ssl-cert-snakeoil.pem',
  sslKeyFile: '/etc/ssl/private/ssl-cert-snakeoil.key',
}

/**
 * Build the layout from the process environment.
 * PG_CLUSTER_CONF_ROOT moves the configuration root, PGSYSCONFDIR the
 * common configuration directory.
 */
export function loadLayout(
  env: LayoutEnv = process.env,
  overrides: Partial<ClusterLayout> = {},
): ClusterLayout {
  const layout: ClusterLayout = { ...defaultLayout }
  if (env.PG_CLUSTER_CONF_ROOT) {
    layout.confRoot = env.PG_CLUSTER_CONF_ROOT
  }
  if (env.PGSYSCONFDIR) {
    layout.commonConfDir = env.PGSYSCONFDIR
  }
  return Object.freeze({ ...layout, ...overrides })
}

/**
 * Path helpers bound to a layout
 */
export function clusterPaths(layout: ClusterLayout) {
  return {
    versionConfigPath(version: string): string {
      return join(layout.confRoot, version)
    },

    configPath(version: string, cluster: string): string {
      return join(layout.confRoot, version, cluster)
    },

    configFilePath(version: string, cluster: string, file: string): string {
      return join(layout.confRoot, version, cluster, file)
    },

    commonConfigPath(file: string): string {
      return join(layout.commonConfDir, file)
    },

    defaultDataPath(version: string, cluster: string): string {
      return join(layout.dataRoot, version, cluster)
    },

    binPath(version: string): string {
      return join(layout.binRoot, version, 'bin')
    },

    programPath(program: string, version: string): string {
      return join(layout.binRoot, version, 'bin', program)
    },

    defaultLogPath(version: string, cluster: string): string {
      return join(layout.logRoot, `postgresql-${version}-${cluster}.log`)
    },

    backupClusterPath(version: string, cluster: string): string {
      return join(layout.backupRoot, `${version}-${cluster}`)
    },

    upgradeHooksPath(): string {
      return join(layout.commonConfDir, 'pg_upgradecluster.d')
    },
  }
}

export type ClusterPaths = ReturnType<typeof clusterPaths>
