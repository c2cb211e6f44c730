/**
 * Shared spawn utilities for executing commands safely
 *
 * Every external tool (initdb, pg_ctl, pg_dump, tar, hook scripts) goes
 * through a CommandRunner so tests can swap in an in-process fake.
 */

import { spawn } from 'child_process'
import { basename } from 'path'
import { externalToolError, logDebug, toolNotFoundError } from './error-handler'

export type SpawnOptions = {
  cwd?: string
  timeout?: number
  env?: Record<string, string>
  // run the child as this account (root only)
  uid?: number
  gid?: number
  // written to the child's stdin, which is closed afterwards
  input?: string
  // resolve with the exit code instead of rejecting on non-zero exit
  allowFailure?: boolean
}

export type SpawnResult = {
  stdout: string
  stderr: string
  exitCode: number
}

export type Invocation = {
  command: string
  args: string[]
  options?: SpawnOptions
}

export interface CommandRunner {
  run(command: string, args: string[], options?: SpawnOptions): Promise<SpawnResult>
  /**
   * Run `producer | consumer` and wait for both; fails when either does
   */
  pipe(producer: Invocation, consumer: Invocation): Promise<void>
}

function childEnv(env?: Record<string, string>): NodeJS.ProcessEnv | undefined {
  return env ? { ...process.env, ...env } : undefined
}

/**
 * Execute a command using spawn with argument array (safer than shell interpolation)
 *
 * @throws PgClusterError (external-tool) if the command fails, times out,
 * or cannot be executed
 */
export function spawnAsync(
  command: string,
  args: string[],
  options?: SpawnOptions,
): Promise<SpawnResult> {
  const tool = basename(command)
  logDebug(`Running ${command}`, { args, uid: options?.uid })

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: [options?.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      cwd: options?.cwd,
      env: childEnv(options?.env),
      uid: options?.uid,
      gid: options?.gid,
    })

    let stdout = ''
    let stderr = ''
    let timedOut = false
    let timer: ReturnType<typeof setTimeout> | undefined

    if (options?.timeout && options.timeout > 0) {
      timer = setTimeout(() => {
        timedOut = true
        proc.kill('SIGKILL')
        reject(
          externalToolError(tool, null, `timed out after ${options.timeout}ms`),
        )
      }, options.timeout)
    }

    const cleanup = () => {
      if (timer) clearTimeout(timer)
    }

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    if (options?.input !== undefined && proc.stdin) {
      // a child that exits without reading its input is judged by its exit code
      proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code !== 'EPIPE') logDebug(`${tool} stdin: ${err.message}`)
      })
      proc.stdin.end(options.input)
    }

    proc.on('close', (code) => {
      cleanup()
      if (timedOut) return // Already rejected by timeout
      const exitCode = code ?? -1
      if (exitCode === 0 || options?.allowFailure) {
        resolve({ stdout, stderr, exitCode })
      } else {
        reject(externalToolError(tool, code, stderr || stdout))
      }
    })

    proc.on('error', (err: NodeJS.ErrnoException) => {
      cleanup()
      if (timedOut) return // Already rejected by timeout
      if (err.code === 'ENOENT') {
        reject(toolNotFoundError(command))
      } else {
        reject(externalToolError(tool, null, err.message))
      }
    })
  })
}

/**
 * Connect the stdout of one process to the stdin of another
 */
export function pipeAsync(producer: Invocation, consumer: Invocation): Promise<void> {
  logDebug(`Piping ${producer.command} into ${consumer.command}`)

  return new Promise((resolve, reject) => {
    const left = spawn(producer.command, producer.args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: childEnv(producer.options?.env),
      uid: producer.options?.uid,
      gid: producer.options?.gid,
    })
    const right = spawn(consumer.command, consumer.args, {
      stdio: ['pipe', 'ignore', 'pipe'],
      env: childEnv(consumer.options?.env),
      uid: consumer.options?.uid,
      gid: consumer.options?.gid,
    })

    let leftErr = ''
    let rightErr = ''
    let pending = 2
    let failed = false

    left.stderr?.on('data', (data: Buffer) => {
      leftErr += data.toString()
    })
    right.stderr?.on('data', (data: Buffer) => {
      rightErr += data.toString()
    })
    if (left.stdout && right.stdin) {
      // a consumer that exits early closes the pipe; its exit code reports why
      right.stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code !== 'EPIPE') logDebug(`${basename(consumer.command)} stdin: ${err.message}`)
      })
      left.stdout.pipe(right.stdin)
    }

    const fail = (error: Error) => {
      if (failed) return
      failed = true
      left.kill()
      right.kill()
      reject(error)
    }

    const done = (tool: string, output: () => string) => (code: number | null) => {
      if (code !== 0) {
        fail(externalToolError(basename(tool), code, output()))
        return
      }
      pending -= 1
      if (pending === 0 && !failed) resolve()
    }

    left.on('close', done(producer.command, () => leftErr))
    right.on('close', done(consumer.command, () => rightErr))
    // nothing reads the producer's output any more
    right.on('close', () => left.stdout?.destroy())
    left.on('error', (err) => fail(externalToolError(basename(producer.command), null, err.message)))
    right.on('error', (err) => fail(externalToolError(basename(consumer.command), null, err.message)))
  })
}

export class ProcessCommandRunner implements CommandRunner {
  run(command: string, args: string[], options?: SpawnOptions): Promise<SpawnResult> {
    return spawnAsync(command, args, options)
  }

  pipe(producer: Invocation, consumer: Invocation): Promise<void> {
    return pipeAsync(producer, consumer)
  }
}
