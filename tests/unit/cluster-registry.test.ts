import { describe, it, before, after } from 'node:test'
import { mkdir, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { ErrorCodes } from '../../core/error-handler'
import { createCluster, createTestHost, type TestHost } from '../utils/fake-host'
import {
  assert,
  assertDeepEqual,
  assertEqual,
  assertErrorCode,
  assertRejects,
} from '../utils/assertions'

describe('ClusterRegistry', () => {
  let host: TestHost

  before(async () => {
    host = await createTestHost({ versions: ['15', '16'] })
    await createCluster(host, '16', 'main')
    await createCluster(host, '16', 'alpha')
  })

  after(async () => {
    await host.cleanup()
  })

  describe('listVersions', () => {
    it('should list installed versions in version order', async () => {
      await mkdir(join(host.layout.binRoot, 'extras'), { recursive: true })

      assertDeepEqual(await host.services.registry.listVersions(), ['15', '16'], 'Installed versions')
    })

    it('should include versions that only have a configured cluster', async () => {
      const legacy = join(host.layout.confRoot, '9.6', 'legacy')
      await mkdir(legacy, { recursive: true })
      await writeFile(join(legacy, 'postgresql.conf'), "data_directory = '/nonexistent'\n")

      const { registry } = host.services
      assertDeepEqual(await registry.listVersions(), ['9.6', '15', '16'], 'Configured version added')
      assertDeepEqual(await registry.listVersions('pg_dump'), ['15', '16'], 'Only for the server program')
      assertDeepEqual(await registry.listVersions('postgres', '15'), ['9.6', '15'], 'Capped at 15')
    })

    it('should name the newest version', async () => {
      assertEqual(await host.services.registry.newestVersion(), '16', 'Newest version')
    })
  })

  describe('listClusters', () => {
    it('should list clusters sorted by name', async () => {
      assertDeepEqual(await host.services.registry.listClusters('16'), ['alpha', 'main'], 'Clusters of 16')
      assertDeepEqual(await host.services.registry.listClusters('15'), [], 'No clusters of 15')
    })
  })

  describe('describe', () => {
    it('should describe a stopped cluster', async () => {
      const info = await host.services.registry.describe('16', 'main')

      assertEqual(info.port, 5432, 'Port')
      assertEqual(info.dataDir, join(host.layout.dataRoot, '16', 'main'), 'Data directory')
      assertEqual(info.configDir, join(host.layout.confRoot, '16', 'main'), 'Config directory')
      assertEqual(info.socketDir, host.layout.socketRoot, 'Socket directory')
      assertEqual(info.running, false, 'Not running')
      assertEqual(info.recovery, false, 'Not in recovery')
      assertEqual(info.start, 'auto', 'Start mode')
      assertEqual(info.ownerUid, host.owner.uid, 'Owner uid')
      assertEqual(info.logFile, join(host.layout.logRoot, 'postgresql-16-main.log'), 'Log file')
      assertEqual(info.customLog, false, 'Default log')
    })

    it('should see a server through its pid file', async () => {
      const { registry, control } = host.services
      await control.start(await registry.describe('16', 'alpha'))

      const info = await registry.describe('16', 'alpha')
      assertEqual(info.running, true, 'Running after start')
      assertEqual(info.port, 5433, 'Second cluster port')

      await control.stop(info)
      assertEqual((await registry.describe('16', 'alpha')).running, false, 'Stopped again')
    })

    it('should fall back to the socket when the pid file cannot tell', async () => {
      const { registry, control } = host.services
      await control.start(await registry.describe('16', 'alpha'))
      // the pid no longer belongs to a visible process
      host.processes.live.clear()

      const info = await registry.describe('16', 'alpha')
      assertEqual(info.running, true, 'Socket accepts connections')

      await control.stop(info)
    })

    it('should merge ALTER SYSTEM settings except data_directory', async () => {
      const { registry } = host.services
      const dataDir = join(host.layout.dataRoot, '16', 'main')
      await writeFile(
        join(dataDir, 'postgresql.auto.conf'),
        "work_mem = '64MB'\ndata_directory = '/elsewhere'\n",
      )

      const conf = await registry.readClusterConf('16', 'main', 'postgresql.conf')
      assertEqual(conf.work_mem, '64MB', 'Override merged')
      assertEqual(conf.data_directory, dataDir, 'data_directory untouched')
    })

    it('should report recovery from the signal files', async () => {
      const dataDir = join(host.layout.dataRoot, '16', 'main')
      await writeFile(join(dataDir, 'standby.signal'), '')

      assert((await host.services.registry.describe('16', 'main')).recovery, 'Standby detected')
    })

    it('should fail for a cluster without postgresql.conf', async () => {
      const error = await assertRejects(host.services.registry.describe('16', 'nothere'), 'Missing cluster')
      assertErrorCode(error, ErrorCodes.CLUSTER_INFO_MISSING, 'No configuration')
    })
  })

  describe('confFilePath', () => {
    it('should fall back to the common configuration directory', async () => {
      const { registry } = host.services
      assertEqual(
        await registry.confFilePath('16', 'main', 'pg_ident.conf'),
        join(host.layout.confRoot, '16', 'main', 'pg_ident.conf'),
        'Cluster file',
      )
      assertEqual(
        await registry.confFilePath('16', 'main', 'createcluster.conf'),
        join(host.layout.commonConfDir, 'createcluster.conf'),
        'Common file',
      )
      assertEqual(
        await registry.confFilePath('16', 'main', 'postgresql.auto.conf'),
        join(host.layout.dataRoot, '16', 'main', 'postgresql.auto.conf'),
        'auto.conf lives in the data directory',
      )
    })
  })

  describe('ports', () => {
    it('should map claimed ports to clusters', async () => {
      const ports = await host.services.registry.collectPorts()

      assertEqual(ports.get(5432), '16/main', 'First cluster')
      assertEqual(ports.get(5433), '16/alpha', 'Second cluster')
    })

    it('should hand out the next free port', async () => {
      assertEqual(await host.services.registry.claimPort(), 5434, 'Next port')
    })

    it('should accept a free explicit port', async () => {
      assertEqual(await host.services.registry.claimPort(6543), 6543, 'Requested port')
    })

    it('should refuse an explicit port another cluster has', async () => {
      const error = await assertRejects(host.services.registry.claimPort(5433), 'Port taken')
      assertErrorCode(error, ErrorCodes.PORT_IN_USE, 'Port in use')
      assert(error.message.includes('16/alpha'), 'Names the holder')
    })
  })

  describe('validateOwnership', () => {
    it('should accept the clusters it created', async () => {
      const { registry } = host.services
      await registry.validateOwnership(await registry.describe('16', 'alpha'))
    })

    it('should refuse a data directory owned by root', async () => {
      const { registry } = host.services
      const info = await registry.describe('16', 'alpha')

      const error = await assertRejects(
        registry.validateOwnership({ ...info, ownerUid: 0 }),
        'Root-owned data',
      )
      assertErrorCode(error, ErrorCodes.OWNERSHIP_INVALID, 'Owned by root')
    })

    it('should refuse an owner that has no account', async () => {
      const { registry } = host.services
      const info = await registry.describe('16', 'alpha')

      const error = await assertRejects(
        registry.validateOwnership({ ...info, ownerUid: 4243 }),
        'Unknown owner',
      )
      assertErrorCode(error, ErrorCodes.OWNERSHIP_INVALID, 'Unknown uid')
    })
  })

  describe('socketDirectory', () => {
    it('should take the first configured directory', async () => {
      const dir = await host.services.registry.socketDirectory('16', 'main', {
        unix_socket_directories: '/srv/sockets, /tmp',
      })

      assertEqual(dir, '/srv/sockets', 'First entry')
    })

    it('should use the socket root when it has the data owner', async () => {
      const dir = await host.services.registry.socketDirectory('16', 'main', {
        data_directory: join(host.layout.dataRoot, '16', 'main'),
      })

      assertEqual(dir, host.layout.socketRoot, 'Shared socket root')
    })
  })
})

describe('ClusterRegistry without a socket root', () => {
  let host: TestHost

  before(async () => {
    host = await createTestHost()
    await createCluster(host, '16', 'main')
    await rm(host.layout.socketRoot, { recursive: true })
  })

  after(async () => {
    await host.cleanup()
  })

  it('should refuse to guess a socket directory', async () => {
    const error = await assertRejects(
      host.services.registry.socketDirectory('16', 'main', {
        data_directory: join(host.layout.dataRoot, '16', 'main'),
      }),
      'Missing socket root',
    )
    assertErrorCode(error, ErrorCodes.FILESYSTEM_ERROR, 'Cannot stat')
  })

  it('should still honour a configured directory', async () => {
    const dir = await host.services.registry.socketDirectory('16', 'main', {
      unix_socket_directories: '/srv/sockets',
    })

    assertEqual(dir, '/srv/sockets', 'Configured directory')
  })
})
