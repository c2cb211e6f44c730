/**
 * Small per-cluster files next to postgresql.conf: start.conf,
 * pg_ctl.conf and environment
 */

import { copyFile, readFile, stat, writeFile, chmod } from 'fs/promises'
import { join } from 'path'
import { fileModes } from '../config/defaults'
import {
  ErrorCodes,
  isMissingFileError,
  malformedConfigError,
  validationError,
} from './error-handler'
import { replaceVersionCluster } from './conf-file'
import { isStartMode, type StartMode } from '../types'

const START_CONF_TEMPLATE = `# Automatic startup configuration
#   auto: automatically start the cluster
#   manual: manual startup with pgcluster start only
#   disabled: refuse to start cluster
# See pgcluster create --help for details.

`

const PG_CTL_CONF_TEMPLATE = `# Automatic pg_ctl configuration
# This configuration file contains cluster specific options to be passed to
# pg_ctl(1).

`

const ENVIRONMENT_TEMPLATE = `# environment variables for postgres processes
# This file has the same syntax as postgresql.conf:
#  VARIABLE = simple_value
#  VARIABLE2 = 'any value!'
# I. e. you need to enclose any value which does not only consist of letters,
# numbers, and '-', '_', '.' in single quotes. Shell commands are not
# evaluated.
`

export function startConfPath(configDir: string): string {
  return join(configDir, 'start.conf')
}

/**
 * Read start.conf; a missing file means "auto"
 */
export async function getStartConf(configDir: string): Promise<StartMode> {
  const path = startConfPath(configDir)
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFileError(error)) return 'auto'
    throw error
  }

  for (const rawLine of text.split('\n')) {
    const line = rawLine.replace(/#.*$/, '').trim()
    if (!line) continue
    const mode = /^(auto|manual|disabled)\b/.exec(line)
    if (mode && isStartMode(mode[1])) return mode[1]
    throw malformedConfigError(
      ErrorCodes.START_CONF_INVALID,
      `Invalid mode in ${path}, must be one of auto, manual, disabled`,
      path,
    )
  }
  return 'auto'
}

/**
 * Change start.conf, keeping comments and permissions of an existing file.
 * `comment` goes on its own line right before the mode.
 */
export async function setStartConf(
  configDir: string,
  mode: string,
  comment?: string,
): Promise<void> {
  if (!isStartMode(mode)) {
    throw validationError(
      ErrorCodes.START_CONF_INVALID,
      `Invalid mode: '${mode}'`,
      { mode },
    )
  }

  const path = startConfPath(configDir)
  const commentLine = comment ? `# ${comment}\n` : ''
  let text: string
  let perms: number = fileModes.config

  try {
    const existing = await readFile(path, 'utf8')
    perms = (await stat(path)).mode & 0o7777
    let replaced = false
    text = existing
      .split('\n')
      .map((line) => {
        const match = /^\s*(?:auto|manual|disabled)\b(.*)$/.exec(line)
        if (!match || replaced) return line
        replaced = true
        return `${commentLine}${mode}${match[1]}`
      })
      .join('\n')
    if (!replaced) {
      text = `${text}${text.endsWith('\n') || text === '' ? '' : '\n'}${commentLine}${mode}\n`
    }
  } catch (error) {
    if (!isMissingFileError(error)) throw error
    text = `${START_CONF_TEMPLATE}${commentLine}${mode}\n`
  }

  await writeFile(path, text)
  await chmod(path, perms)
}

export async function setPgCtlConf(
  configDir: string,
  options: string,
): Promise<void> {
  const path = join(configDir, 'pg_ctl.conf')
  const escaped = options.replace(/'/g, "''")
  await writeFile(path, `${PG_CTL_CONF_TEMPLATE}pg_ctl_options = '${escaped}'\n`)
  await chmod(path, fileModes.config)
}

/**
 * Write the cluster's environment file from the common template (with %v
 * and %c substituted), or from the built-in template when there is none
 */
export async function writeEnvironmentFile(
  configDir: string,
  templatePath: string,
  version: string,
  cluster: string,
): Promise<void> {
  const path = join(configDir, 'environment')
  let template = ENVIRONMENT_TEMPLATE
  try {
    template = await readFile(templatePath, 'utf8')
  } catch (error) {
    if (!isMissingFileError(error)) throw error
  }
  await writeFile(path, replaceVersionCluster(template, version, cluster))
  await chmod(path, fileModes.config)
}

/**
 * Copy a cluster file preserving its content only; callers fix ownership
 */
export async function copyClusterFile(source: string, dest: string): Promise<boolean> {
  try {
    await copyFile(source, dest)
    return true
  } catch (error) {
    if (isMissingFileError(error)) return false
    throw error
  }
}
