import { describe, it, before, after } from 'node:test'
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  FileAccountDatabase,
  ProcFsInspector,
  ProcessIdentitySwitcher,
  currentUid,
} from '../../core/platform-service'
import { assert, assertDeepEqual, assertEqual, assertNullish, assertRejects } from '../utils/assertions'

describe('FileAccountDatabase', () => {
  let etc: string

  before(async () => {
    etc = await mkdtemp(join(tmpdir(), 'pgc-etc-'))
    await writeFile(
      join(etc, 'passwd'),
      [
        '# local accounts',
        'root:x:0:0:root:/root:/bin/bash',
        'postgres:x:120:125:PostgreSQL administrator:/var/lib/postgresql:/bin/bash',
        'broken:x:abc:1:::',
        'short:x:1',
        '',
      ].join('\n'),
    )
    await writeFile(
      join(etc, 'group'),
      ['root:x:0:', 'postgres:x:125:', 'ssl-cert:x:110:postgres,www-data', ''].join('\n'),
    )
  })

  after(async () => {
    await rm(etc, { recursive: true, force: true })
  })

  it('should look up accounts by name and uid', async () => {
    const accounts = new FileAccountDatabase(etc)

    assertDeepEqual(
      await accounts.userByName('postgres'),
      { name: 'postgres', uid: 120, gid: 125, home: '/var/lib/postgresql' },
      'Account by name',
    )
    assertEqual((await accounts.userByUid(0))?.name, 'root', 'Account by uid')
    assertNullish(await accounts.userByName('broken'), 'Non-numeric uid is skipped')
    assertNullish(await accounts.userByName('short'), 'Short line is skipped')
    assertNullish(await accounts.userByUid(999), 'Unknown uid')
  })

  it('should look up groups with their members', async () => {
    const accounts = new FileAccountDatabase(etc)

    assertDeepEqual(
      await accounts.groupByName('ssl-cert'),
      { name: 'ssl-cert', gid: 110, members: ['postgres', 'www-data'] },
      'Group with members',
    )
    assertDeepEqual((await accounts.groupByGid(125))?.members, [], 'Group without members')
    assertNullish(await accounts.groupByName('nobody'), 'Unknown group')
  })

  it('should treat missing files as empty databases', async () => {
    const accounts = new FileAccountDatabase(join(etc, 'nowhere'))

    assertNullish(await accounts.userByName('root'), 'No passwd file')
    assertNullish(await accounts.groupByGid(0), 'No group file')
  })
})

describe('ProcFsInspector', () => {
  let proc: string

  before(async () => {
    proc = await mkdtemp(join(tmpdir(), 'pgc-proc-'))
    await mkdir(join(proc, '4711'))
    await writeFile(
      join(proc, '4711', 'cmdline'),
      '/usr/lib/postgresql/16/bin/postgres\0-D\0/var/lib/postgresql/16/main\0',
    )
  })

  after(async () => {
    await rm(proc, { recursive: true, force: true })
  })

  it('should split the command line on NUL bytes', async () => {
    assertDeepEqual(
      await new ProcFsInspector(proc).commandLine(4711),
      ['/usr/lib/postgresql/16/bin/postgres', '-D', '/var/lib/postgresql/16/main'],
      'argv of the process',
    )
  })

  it('should return null for a process that does not exist', async () => {
    assertNullish(await new ProcFsInspector(proc).commandLine(4712), 'No such process')
  })
})

describe('ProcessIdentitySwitcher', () => {
  const switcher = new ProcessIdentitySwitcher()
  const self = {
    uid: process.getuid ? process.getuid() : 0,
    gid: process.getgid ? process.getgid() : 0,
  }

  it('should report privilege from the effective uid', () => {
    assertEqual(switcher.isPrivileged(), currentUid() === 0, 'Privileged only as root')
  })

  it('should return the result of the wrapped function', async () => {
    assertEqual(await switcher.withIdentity(self, async () => 42), 42, 'Result passed through')
  })

  it('should propagate errors and restore the identity', async () => {
    const before = currentUid()
    const error = await assertRejects(
      switcher.withIdentity(self, async () => {
        throw new Error('inside')
      }),
      'Error should propagate',
    )

    assert(error instanceof Error && error.message === 'inside', 'Same error')
    assertEqual(currentUid(), before, 'Identity restored')
  })
})
