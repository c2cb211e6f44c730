import { describe, it, before, after } from 'node:test'
import { chmod, mkdir, readFile, stat, writeFile } from 'fs/promises'
import { basename, join } from 'path'
import type { UpgradeResult } from '../../core/cluster-upgrade'
import { setConfFileValue } from '../../core/conf-file'
import { ErrorCodes } from '../../core/error-handler'
import {
  createCluster,
  createTestHost,
  readClusterConf,
  type TestHost,
} from '../utils/fake-host'
import {
  assert,
  assertDeepEqual,
  assertEqual,
  assertErrorCode,
  assertRejects,
} from '../utils/assertions'

async function hostWithRunningSource(): Promise<TestHost> {
  const host = await createTestHost({ versions: ['15', '16'] })
  const { info } = await createCluster(host, '15', 'main')
  await host.services.control.start(info)
  return host
}

// server options of every start of 15/main, oldest first
function sourceStartOptions(host: TestHost): string[] {
  const dataDir = join(host.layout.dataRoot, '15', 'main')
  return host.runner
    .callsOf('pg_ctl')
    .filter(({ args }) => args[0] === 'start' && args.includes(dataDir))
    .map(({ args }) => args[args.indexOf('-o') + 1])
}

async function assertSourceRestored(host: TestHost): Promise<void> {
  const { registry } = host.services
  assertDeepEqual(await registry.listClusters('16'), [], 'New cluster dropped')
  const source = await registry.describe('15', 'main')
  assertEqual(source.running, true, 'Old cluster running again')
  assertEqual(source.port, 5432, 'Old port kept')
  assertEqual(source.start, 'auto', 'Startup mode untouched')

  const starts = sourceStartOptions(host)
  assert(starts.length >= 3, 'Started restricted then restarted')
  assert(starts[starts.length - 2].includes('hba_file'), 'Restricted start used a private hba')
  assert(!starts[starts.length - 1].includes('hba_file'), 'Restarted without restrictions')
}

describe('ClusterUpgrader', () => {
  describe('dump upgrade', () => {
    let host: TestHost
    let result: UpgradeResult

    before(async () => {
      host = await hostWithRunningSource()
      await setConfFileValue(
        join(host.layout.confRoot, '15', 'main', 'postgresql.conf'),
        'vacuum_defer_cleanup_age',
        '10',
      )
      await setConfFileValue(
        join(host.layout.confRoot, '15', 'main', 'postgresql.conf'),
        'encryption_key_command',
        'cat /etc/pgcluster/key',
      )
      await setConfFileValue(
        join(host.layout.confRoot, '15', 'main', 'postgresql.conf'),
        'ssl',
        'on',
      )
      await writeFile(join(host.layout.dataRoot, '15', 'main', 'server.crt'), 'test certificate\n')
      await writeFile(join(host.layout.dataRoot, '15', 'main', 'server.key'), 'test key\n')
      result = await host.services.upgrader.upgrade({ version: '15', name: 'main' })
    })

    after(async () => {
      await host.cleanup()
    })

    it('should walk every state in order', () => {
      assertDeepEqual(
        result.states,
        [
          'validate',
          'stop-source',
          'create-target',
          'migrate-config',
          'init-hooks',
          'migrate-data',
          'swap-ports',
          'disable-source',
          'start-target',
          'finish-hooks',
          'done',
        ],
        'Upgrade states',
      )
      assertEqual(result.method, 'dump', 'Default method')
    })

    it('should hand the old port to the new cluster', () => {
      assertEqual(result.target.version, '16', 'Target version')
      assertEqual(result.target.port, 5432, 'Target takes the old port')
      assertEqual(result.source.port, 5433, 'Source moves to the work port')
      assertEqual(result.target.running, true, 'Target running')
      assertEqual(result.source.running, false, 'Source stopped')
    })

    it('should set the old cluster to manual startup with a note', async () => {
      const text = await readFile(join(host.layout.confRoot, '15', 'main', 'start.conf'), 'utf8')

      assertEqual(result.source.start, 'manual', 'Manual startup')
      assert(
        text.endsWith('# upgraded to 16/main, kept for reference\nmanual\n'),
        'Note before the mode',
      )
      assertEqual(result.target.start, 'auto', 'Target starts automatically')
    })

    it('should rewrite paths in the copied configuration', async () => {
      const conf = await readClusterConf(host, '16', 'main')

      assertEqual(conf.data_directory, join(host.layout.dataRoot, '16', 'main'), 'data_directory')
      assertEqual(conf.hba_file, join(host.layout.confRoot, '16', 'main', 'pg_hba.conf'), 'hba_file')
      assertEqual(conf.external_pid_file, join(host.layout.socketRoot, '16-main.pid'), 'pid file')
      assertEqual(conf.cluster_name, '16/main', 'cluster_name')
      assertEqual(conf.vacuum_defer_cleanup_age, undefined, 'Obsolete setting disabled')
      assertDeepEqual(
        result.appliedRules,
        ['vacuum_defer_cleanup_age: not available in 16 or later'],
        'Applied rules',
      )
    })

    it('should carry the locale of the old cluster to initdb', () => {
      const args = host.runner.callsOf('initdb')[1].args

      assert(args.includes('--lc-collate=C.UTF-8'), 'Collation')
      assert(args.includes('--encoding=UTF8'), 'Encoding')
      assert(args.includes('--locale-provider=libc'), 'Locale provider')
    })

    it('should carry certificates from the old data directory when SSL is on', async () => {
      const conf = await readClusterConf(host, '16', 'main')
      const dataDir = join(host.layout.dataRoot, '16', 'main')

      assertEqual(conf.ssl, 'on', 'SSL still on')
      assertEqual(conf.ssl_cert_file, join(dataDir, 'server.crt'), 'Certificate setting')
      assertEqual(conf.ssl_key_file, join(dataDir, 'server.key'), 'Key setting')
      assertEqual(conf.ssl_ca_file, undefined, 'No CA without a setting')
      assertEqual(await readFile(join(dataDir, 'server.crt'), 'utf8'), 'test certificate\n', 'Certificate copied')
      assertEqual((await stat(join(dataDir, 'server.key'))).mode & 0o777, 0o600, 'Key private')
    })

    it('should hand the encryption key command to initdb', () => {
      const args = host.runner.callsOf('initdb')[1].args
      const at = args.indexOf('--encryption-key-command')

      assert(at > 0, 'Key command option passed')
      assertEqual(args[at + 1], 'cat /etc/pgcluster/key', 'Key command value')
      assertEqual(
        host.runner.callsOf('initdb')[0].args.indexOf('--encryption-key-command'),
        -1,
        'Not passed when the old cluster was created',
      )
    })

    it('should copy roles without the owner and every connectable database', () => {
      assertEqual(host.runner.scripts.length, 1, 'One globals script')
      assert(!host.runner.scripts[0].includes('CREATE ROLE "postgres";'), 'Owner role skipped')
      assert(host.runner.scripts[0].includes('CREATE ROLE "app";'), 'Other roles kept')
      assertDeepEqual(
        host.runner.pipes.map(({ producer }) => producer.args[producer.args.length - 1]),
        ['postgres', 'template1'],
        'Databases dumped',
      )
    })
  })

  describe('rollback', () => {
    let host: TestHost

    before(async () => {
      host = await hostWithRunningSource()
    })

    after(async () => {
      await host.cleanup()
    })

    it('should drop the new cluster and restart the old one on failure', async () => {
      host.runner.failWhen = (call) => basename(call.command) === 'pg_dumpall'
      const error = await assertRejects(
        host.services.upgrader.upgrade({ version: '15', name: 'main' }),
        'Injected failure',
      )
      host.runner.failWhen = null

      assertErrorCode(error, ErrorCodes.TOOL_FAILED, 'Tool failure surfaces')
      const { registry } = host.services
      assertDeepEqual(await registry.listClusters('16'), [], 'New cluster dropped')
      const source = await registry.describe('15', 'main')
      assertEqual(source.running, true, 'Old cluster running again')
      assertEqual(source.port, 5432, 'Old port kept')
      assertEqual(source.start, 'auto', 'Startup mode untouched')
    })

    it('should restore the old cluster when the dump consumer exits early', async () => {
      host.runner.pipeThrough = {
        producer: { command: 'head', args: ['-c', '50000000', '/dev/zero'] },
        consumer: { command: 'sh', args: ['-c', 'exit 3'] },
      }
      const error = await assertRejects(
        host.services.upgrader.upgrade({ version: '15', name: 'main' }),
        'Broken pipeline',
      )
      host.runner.pipeThrough = null

      assertErrorCode(error, ErrorCodes.TOOL_FAILED, 'Pipeline failure surfaces')
      await assertSourceRestored(host)
    })

    it('should restore the old cluster when pg_upgrade fails', async () => {
      host.runner.failWhen = (call) => basename(call.command) === 'pg_upgrade'
      const error = await assertRejects(
        host.services.upgrader.upgrade({ version: '15', name: 'main', method: 'upgrade' }),
        'Injected pg_upgrade failure',
      )
      host.runner.failWhen = null

      assertErrorCode(error, ErrorCodes.TOOL_FAILED, 'pg_upgrade failure surfaces')
      await assertSourceRestored(host)
    })
  })

  describe('binary upgrade', () => {
    let host: TestHost

    before(async () => {
      host = await createTestHost({ versions: ['15', '16'] })
      await createCluster(host, '15', 'main')
    })

    after(async () => {
      await host.cleanup()
    })

    it('should run pg_upgrade with both clusters', async () => {
      const result = await host.services.upgrader.upgrade({
        version: '15',
        name: 'main',
        method: 'link',
        jobs: 2,
      })
      const [call] = host.runner.callsOf('pg_upgrade')
      const { binRoot, confRoot, dataRoot, logRoot } = host.layout

      assertDeepEqual(
        call.args,
        [
          '-b',
          join(binRoot, '15', 'bin'),
          '-B',
          join(binRoot, '16', 'bin'),
          '-p',
          '5432',
          '-P',
          '5433',
          '-d',
          join(dataRoot, '15', 'main'),
          '-D',
          join(dataRoot, '16', 'main'),
          '-o',
          `-c config_file=${join(confRoot, '15', 'main', 'postgresql.conf')}`,
          '-O',
          `-c config_file=${join(confRoot, '16', 'main', 'postgresql.conf')}`,
          '--link',
          '--jobs',
          '2',
        ],
        'pg_upgrade arguments',
      )
      assert(
        (call.options?.cwd ?? '').startsWith(join(logRoot, 'pg_upgrade-15-16-main.')),
        'Runs in its log directory',
      )
      assertEqual(host.runner.callsOf('pg_dumpall').length, 0, 'No dump')
      assertEqual(result.target.port, 5432, 'Ports swapped')
      assertEqual(result.target.running, true, 'Target started')
    })
  })

  describe('options and checks', () => {
    let host: TestHost

    before(async () => {
      host = await createTestHost({ versions: ['15', '16'] })
      await createCluster(host, '15', 'main')
      await createCluster(host, '15', 'replica')
      await writeFile(join(host.layout.dataRoot, '15', 'replica', 'standby.signal'), '')
      await createCluster(host, '16', 'main')
    })

    after(async () => {
      await host.cleanup()
    })

    it('should refuse a target that already exists', async () => {
      const error = await assertRejects(
        host.services.upgrader.upgrade({ version: '15', name: 'main' }),
        'Target exists',
      )
      assertErrorCode(error, ErrorCodes.CLUSTER_ALREADY_EXISTS, 'Existing target')
    })

    it('should refuse a version that is not newer', async () => {
      const error = await assertRejects(
        host.services.upgrader.upgrade({ version: '16', name: 'main', newVersion: '15' }),
        'Downgrade',
      )
      assertErrorCode(error, ErrorCodes.INVALID_VERSION, 'Not newer')
    })

    it('should refuse a cluster in recovery', async () => {
      const error = await assertRejects(
        host.services.upgrader.upgrade({ version: '15', name: 'replica' }),
        'Standby',
      )
      assertErrorCode(error, ErrorCodes.CLUSTER_IN_RECOVERY, 'In recovery')
    })

    it('should keep an explicit port and skip the swap', async () => {
      const result = await host.services.upgrader.upgrade({
        version: '15',
        name: 'main',
        newName: 'next',
        port: 6000,
        noStart: true,
      })

      assert(!result.states.includes('swap-ports'), 'No swap')
      assert(!result.states.includes('start-target'), 'Not started')
      assertEqual(result.target.name, 'next', 'New name')
      assertEqual(result.target.port, 6000, 'Explicit port')
      assertEqual(result.source.port, 5432, 'Source keeps its port')
      assertEqual(result.target.running, false, 'Target stopped')
    })
  })

  describe('hooks', () => {
    let host: TestHost
    let hook: string

    before(async () => {
      host = await createTestHost({ versions: ['15', '16'] })
      await createCluster(host, '15', 'main')
      const hooks = join(host.layout.commonConfDir, 'pg_upgradecluster.d')
      await mkdir(hooks, { recursive: true })
      hook = join(hooks, '10-extensions')
      await writeFile(hook, '#!/bin/sh\nexit 0\n')
      await chmod(hook, 0o755)
      await writeFile(join(hooks, 'README'), 'not a hook\n')
    })

    after(async () => {
      await host.cleanup()
    })

    it('should fail the upgrade when a hook fails and roll back', async () => {
      host.runner.failWhen = (call) => call.command === hook && call.args[3] === 'finish'
      const error = await assertRejects(
        host.services.upgrader.upgrade({ version: '15', name: 'main' }),
        'Hook failure',
      )
      host.runner.failWhen = null

      assertErrorCode(error, ErrorCodes.HOOK_FAILED, 'Hook failed')
      assertDeepEqual(await host.services.registry.listClusters('16'), [], 'Target dropped')
      const source = await host.services.registry.describe('15', 'main')
      assertEqual(source.port, 5432, 'Port swap undone')
      assertEqual(source.start, 'auto', 'Startup mode restored')
    })

    it('should run executable hooks with version, name and phase', async () => {
      host.runner.calls.length = 0
      await host.services.upgrader.upgrade({ version: '15', name: 'main' })

      const hookCalls = host.runner.calls.filter((call) => call.command === hook)
      assertDeepEqual(
        hookCalls.map((call) => call.args),
        [
          ['15', 'main', '16', 'init'],
          ['15', 'main', '16', 'finish'],
        ],
        'Hook invocations',
      )
    })
  })
})
