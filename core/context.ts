import { clusterPaths, loadLayout, type ClusterLayout, type ClusterPaths } from '../config/paths'
import {
  FileAccountDatabase,
  ProcFsInspector,
  ProcessIdentitySwitcher,
  type AccountDatabase,
  type IdentitySwitcher,
  type ProcessInspector,
} from './platform-service'
import { NetPortProbe, type PortProbe } from './port-manager'
import { ProcessCommandRunner, type CommandRunner } from './spawn-utils'

/**
 * Everything that touches the host outside the cluster file tree
 */
export type HostServices = {
  runner: CommandRunner
  identity: IdentitySwitcher
  accounts: AccountDatabase
  portProbe: PortProbe
  processes: ProcessInspector
}

/**
 * Handed to every component constructor; never changed after startup
 */
export type ClusterContext = {
  layout: ClusterLayout
  paths: ClusterPaths
  host: HostServices
}

export function defaultHostServices(): HostServices {
  return {
    runner: new ProcessCommandRunner(),
    identity: new ProcessIdentitySwitcher(),
    accounts: new FileAccountDatabase(),
    portProbe: new NetPortProbe(),
    processes: new ProcFsInspector(),
  }
}

export function createContext(
  layout: ClusterLayout = loadLayout(),
  host: Partial<HostServices> = {},
): ClusterContext {
  return Object.freeze({
    layout,
    paths: clusterPaths(layout),
    host: Object.freeze({ ...defaultHostServices(), ...host }),
  })
}
