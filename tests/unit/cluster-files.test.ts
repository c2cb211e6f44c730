import { describe, it, before, after } from 'node:test'
import { chmod, mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  copyClusterFile,
  getStartConf,
  setPgCtlConf,
  setStartConf,
  writeEnvironmentFile,
} from '../../core/cluster-files'
import { readConfFile } from '../../core/conf-file'
import { ErrorCodes } from '../../core/error-handler'
import { assert, assertEqual, assertErrorCode, assertRejects } from '../utils/assertions'

describe('cluster files', () => {
  let root: string
  let counter = 0

  const freshDir = async (): Promise<string> => {
    const dir = join(root, `cluster-${counter++}`)
    await mkdir(dir, { recursive: true })
    return dir
  }

  before(async () => {
    root = await mkdtemp(join(tmpdir(), 'pgc-files-'))
  })

  after(async () => {
    await rm(root, { recursive: true, force: true })
  })

  describe('start.conf', () => {
    it('should read a missing file as auto', async () => {
      assertEqual(await getStartConf(await freshDir()), 'auto', 'Missing start.conf')
    })

    it('should write a new file from the template', async () => {
      const dir = await freshDir()
      await setStartConf(dir, 'manual')

      const text = await readFile(join(dir, 'start.conf'), 'utf8')
      assert(text.startsWith('# Automatic startup configuration\n'), 'Template header')
      assert(text.endsWith('\nmanual\n'), 'Mode on the last line')
      assertEqual(await getStartConf(dir), 'manual', 'Mode reads back')
    })

    it('should replace the mode in place, keeping comments and mode bits', async () => {
      const dir = await freshDir()
      const path = join(dir, 'start.conf')
      await writeFile(path, '# my comment\nauto\n')
      await chmod(path, 0o640)

      await setStartConf(dir, 'disabled', 'upgraded to 17/main')

      assertEqual(
        await readFile(path, 'utf8'),
        '# my comment\n# upgraded to 17/main\ndisabled\n',
        'Comment goes right before the mode',
      )
      assertEqual((await stat(path)).mode & 0o777, 0o640, 'Mode bits kept')
    })

    it('should ignore comments and blank lines when reading', async () => {
      const dir = await freshDir()
      await writeFile(join(dir, 'start.conf'), '# auto would be the default\n\n  manual  # by hand\n')

      assertEqual(await getStartConf(dir), 'manual', 'First real line wins')
    })

    it('should reject an unknown mode in the file', async () => {
      const dir = await freshDir()
      await writeFile(join(dir, 'start.conf'), 'sometimes\n')

      const error = await assertRejects(getStartConf(dir), 'Invalid start.conf')
      assertErrorCode(error, ErrorCodes.START_CONF_INVALID, 'Invalid mode in file')
    })

    it('should refuse to write an unknown mode', async () => {
      const error = await assertRejects(setStartConf(await freshDir(), 'bogus'), 'Invalid mode')
      assertErrorCode(error, ErrorCodes.START_CONF_INVALID, 'Invalid mode argument')
    })
  })

  describe('pg_ctl.conf', () => {
    it('should store options that read back unchanged', async () => {
      const dir = await freshDir()
      await setPgCtlConf(dir, "-t 60 -o '-k /tmp'")

      const conf = await readConfFile(join(dir, 'pg_ctl.conf'))
      assertEqual(conf.pg_ctl_options, "-t 60 -o '-k /tmp'", 'Options round trip')
    })
  })

  describe('environment', () => {
    it('should substitute version and cluster in the common template', async () => {
      const dir = await freshDir()
      const template = join(root, 'environment.template')
      await writeFile(template, "PGCLUSTER_NAME = '%v/%c'\n")

      await writeEnvironmentFile(dir, template, '16', 'main')

      assertEqual(
        await readFile(join(dir, 'environment'), 'utf8'),
        "PGCLUSTER_NAME = '16/main'\n",
        'Substituted template',
      )
    })

    it('should fall back to the built-in template', async () => {
      const dir = await freshDir()
      await writeEnvironmentFile(dir, join(root, 'no-template'), '16', 'main')

      const text = await readFile(join(dir, 'environment'), 'utf8')
      assert(text.startsWith('# environment variables for postgres processes\n'), 'Built-in text')
    })
  })

  describe('copyClusterFile', () => {
    it('should report a missing source instead of failing', async () => {
      const dir = await freshDir()
      assert(!(await copyClusterFile(join(dir, 'absent'), join(dir, 'copy'))), 'Nothing copied')
    })

    it('should copy an existing file', async () => {
      const dir = await freshDir()
      await writeFile(join(dir, 'pg_ident.conf'), 'map  os  db\n')

      assert(await copyClusterFile(join(dir, 'pg_ident.conf'), join(dir, 'copy')), 'Copied')
      assertEqual(await readFile(join(dir, 'copy'), 'utf8'), 'map  os  db\n', 'Same content')
    })
  })
})
