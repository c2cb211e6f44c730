/**
 * Unit tests for spawn-utils module
 *
 * These run real short-lived shell processes.
 */

import { describe, it, before, after } from 'node:test'
import { mkdtemp, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { ErrorCodes } from '../../core/error-handler'
import { pipeAsync, spawnAsync } from '../../core/spawn-utils'
import { assertEqual, assertErrorCode, assertRejects } from '../utils/assertions'

// more than any pipe buffer holds, so the writer blocks until read
const LARGE_INPUT = 'x'.repeat(16 * 1024 * 1024)

describe('spawnAsync', () => {
  it('should feed input to the child', async () => {
    const result = await spawnAsync('sh', ['-c', 'cat'], { input: 'hello' })

    assertEqual(result.stdout, 'hello', 'Echoed input')
    assertEqual(result.exitCode, 0, 'Exit code')
  })

  it('should report the exit code of a child that ignores its input', async () => {
    const error = await assertRejects(
      spawnAsync('sh', ['-c', 'exit 3'], { input: LARGE_INPUT }),
      'Child exits without reading',
    )

    assertErrorCode(error, ErrorCodes.TOOL_FAILED, 'Tool failure')
    assertEqual(error.context?.exitCode, 3, 'Exit code in context')
  })

  it('should resolve a failing child when failure is allowed', async () => {
    const result = await spawnAsync('sh', ['-c', 'exit 3'], {
      input: LARGE_INPUT,
      allowFailure: true,
    })

    assertEqual(result.exitCode, 3, 'Exit code')
  })

  it('should report a missing program', async () => {
    const error = await assertRejects(
      spawnAsync('/nonexistent/pg_ctl', ['status']),
      'Missing program',
    )

    assertErrorCode(error, ErrorCodes.TOOL_NOT_FOUND, 'Not found')
  })
})

describe('pipeAsync', () => {
  let dir: string

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pgcluster-pipe-'))
  })

  after(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should connect the producer to the consumer', async () => {
    const path = join(dir, 'out.txt')
    await pipeAsync(
      { command: 'sh', args: ['-c', 'printf hello'] },
      { command: 'sh', args: ['-c', 'cat > "$1"', 'sh', path] },
    )

    assertEqual(await readFile(path, 'utf8'), 'hello', 'Consumer received the output')
  })

  it('should fail when the consumer exits early with an error', async () => {
    const error = await assertRejects(
      pipeAsync(
        { command: 'head', args: ['-c', '50000000', '/dev/zero'] },
        { command: 'sh', args: ['-c', 'exit 3'] },
      ),
      'Consumer fails',
    )

    assertErrorCode(error, ErrorCodes.TOOL_FAILED, 'Tool failure')
    assertEqual(error.context?.exitCode, 3, 'Consumer exit code')
  })

  it('should fail when the consumer stops reading before the producer is done', async () => {
    const error = await assertRejects(
      pipeAsync(
        { command: 'head', args: ['-c', '50000000', '/dev/zero'] },
        { command: 'sh', args: ['-c', 'exit 0'] },
      ),
      'Producer cut off',
    )

    assertErrorCode(error, ErrorCodes.TOOL_FAILED, 'Tool failure')
    assertEqual(error.context?.tool, 'head', 'Producer reported')
  })

  it('should fail when the producer fails', async () => {
    const error = await assertRejects(
      pipeAsync(
        { command: 'sh', args: ['-c', 'exit 2'] },
        { command: 'sh', args: ['-c', 'cat > /dev/null'] },
      ),
      'Producer fails',
    )

    assertErrorCode(error, ErrorCodes.TOOL_FAILED, 'Tool failure')
    assertEqual(error.context?.exitCode, 2, 'Producer exit code')
  })
})
