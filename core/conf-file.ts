/**
 * PostgreSQL configuration files
 *
 * A configuration file is kept as an ordered list of line nodes so that
 * edits touch exactly one line and every other line is written back
 * byte for byte. Reading resolves include, include_if_exists and
 * include_dir directives relative to the including file.
 */

import { chmod, chown, readdir, readFile, rename, rm, stat, writeFile } from 'fs/promises'
import { dirname, isAbsolute, join, resolve } from 'path'
import { defaults } from '../config/defaults'
import {
  ErrorCodes,
  isErrnoException,
  isMissingFileError,
  logDebug,
  malformedConfigError,
  usageError,
} from './error-handler'
import type { ConfigMap } from '../types'

export type IncludeDirective = 'include' | 'include_if_exists' | 'include_dir'

type AssignmentParts = {
  indent: string
  key: string
  separator: string
  // Value exactly as written, quotes included
  rawValue: string
  // Whitespace and "# comment" after the value
  trailing: string
}

export type ConfigLine =
  | { kind: 'blank'; text: string }
  | { kind: 'comment'; text: string; commented: AssignmentParts | null }
  | ({ kind: 'assignment'; text: string; value: string } & AssignmentParts)
  | { kind: 'include'; text: string; directive: IncludeDirective; path: string }
  | { kind: 'invalid'; text: string }

const KEY = '[A-Za-z0-9_.-]+'
const SEPARATOR = '\\s*(?:=|\\s)\\s*'
const QUOTED_VALUE = "'(?:[^']|''|(?<=\\\\)')*'"
const SIMPLE_VALUE = '-?[A-Za-z0-9][A-Za-z0-9._:/+-]*'
const TRAILING = '\\s*(?:#.*)?'

const ASSIGNMENT_PATTERN = new RegExp(
  `^(\\s*)(${KEY})(${SEPARATOR})(${QUOTED_VALUE}|${SIMPLE_VALUE})(${TRAILING})$`,
)
const INCLUDE_PATTERN =
  /^\s*(include_dir|include_if_exists|include)\s*=?\s*'([^']+)'\s*(?:#.*)?$/i
const BLANK_OR_COMMENT_PATTERN = /^\s*(?:#.*)?$/
const COMMENTED_PATTERN = /^\s*#\s*(.*)$/
const KEY_PATTERN = new RegExp(`^${KEY}$`)

/**
 * Quote a value for a configuration file: numbers and single words pass
 * through, anything else is single-quoted with embedded quotes doubled
 * and backslashes escaped
 */
export function quoteConfValue(value: string): string {
  if (/^-?\d+(\.\d*)?$/.test(value)) return value
  if (/^[A-Za-z0-9]\w*$/.test(value)) return value
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`
}

/**
 * Strip quotes from a raw value and resolve \x and '' escapes
 */
export function unquoteConfValue(rawValue: string): string {
  if (!rawValue.startsWith("'")) return rawValue
  return rawValue
    .slice(1, -1)
    .replace(/\\(.)/g, '$1')
    .replace(/''/g, "'")
}

/**
 * Interpret a boolean setting; undefined for anything unrecognized
 */
export function configBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined
  if (/^(on|true|yes|1)$/i.test(value)) return true
  if (/^(off|false|no|0)$/i.test(value)) return false
  return undefined
}

/**
 * Substitute %v (version), %c (cluster) and %% in a template string
 */
export function replaceVersionCluster(
  template: string,
  version: string,
  cluster: string,
): string {
  return template.replace(/%([vc%])/g, (_, placeholder: string) =>
    placeholder === 'v' ? version : placeholder === 'c' ? cluster : '%',
  )
}

function parseAssignment(text: string): AssignmentParts | null {
  const match = ASSIGNMENT_PATTERN.exec(text)
  if (!match) return null
  const [, indent, key, separator, rawValue, trailing] = match
  return { indent, key, separator, rawValue, trailing }
}

export function parseConfigLine(text: string): ConfigLine {
  if (BLANK_OR_COMMENT_PATTERN.test(text)) {
    if (text.trim() === '') return { kind: 'blank', text }
    const inner = COMMENTED_PATTERN.exec(text)
    const commented = inner ? parseAssignment(inner[1]) : null
    return { kind: 'comment', text, commented }
  }

  const include = INCLUDE_PATTERN.exec(text)
  if (include) {
    const directive = include[1].toLowerCase()
    if (
      directive === 'include' ||
      directive === 'include_if_exists' ||
      directive === 'include_dir'
    ) {
      return { kind: 'include', text, directive, path: include[2] }
    }
  }

  const assignment = parseAssignment(text)
  if (assignment) {
    return {
      kind: 'assignment',
      text,
      value: unquoteConfValue(assignment.rawValue),
      ...assignment,
    }
  }

  return { kind: 'invalid', text }
}

function sameKey(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase()
}

/**
 * Assignment parts of an active line setting `key`. Include directives
 * count as settings of their directive name.
 */
function activeParts(line: ConfigLine, key: string): AssignmentParts | null {
  if (line.kind === 'assignment') {
    return sameKey(line.key, key) ? line : null
  }
  if (line.kind === 'include' && sameKey(line.directive, key)) {
    return parseAssignment(line.text)
  }
  return null
}

function assertValidKey(key: string): void {
  if (!KEY_PATTERN.test(key)) {
    throw usageError(`invalid configuration parameter name "${key}"`)
  }
}

// a value must stay on its assignment line
function assertValidValue(key: string, value: string): void {
  if (/[\r\n]/.test(value)) {
    throw usageError(`value for "${key}" must not contain line breaks`)
  }
}

/**
 * One configuration file as an editable list of lines
 */
export class ConfigDocument {
  private constructor(
    private lines: ConfigLine[],
    private trailingNewline: boolean,
  ) {}

  static parse(text: string): ConfigDocument {
    if (text === '') return new ConfigDocument([], true)
    const trailingNewline = text.endsWith('\n')
    const body = trailingNewline ? text.slice(0, -1) : text
    return new ConfigDocument(body.split('\n').map(parseConfigLine), trailingNewline)
  }

  render(): string {
    if (this.lines.length === 0) return ''
    const body = this.lines.map((line) => line.text).join('\n')
    return this.trailingNewline ? body + '\n' : body
  }

  getLines(): readonly ConfigLine[] {
    return this.lines
  }

  /**
   * Settings of this file alone, without include expansion
   */
  values(): ConfigMap {
    const result: ConfigMap = {}
    for (const line of this.lines) {
      if (line.kind === 'assignment') {
        result[line.key.toLowerCase()] = line.value
      }
    }
    return result
  }

  get(key: string): string | undefined {
    return this.values()[key.toLowerCase()]
  }

  private findAssignment(key: string): number {
    return this.lines.findIndex((line) => activeParts(line, key) !== null)
  }

  private findCommented(key: string): number {
    return this.lines.findIndex(
      (line) =>
        line.kind === 'comment' &&
        line.commented !== null &&
        sameKey(line.commented.key, key),
    )
  }

  /**
   * Set a parameter: rewrite the active assignment, else revive a
   * commented-out one, else append
   */
  set(key: string, value: string): void {
    assertValidKey(key)
    assertValidValue(key, value)
    const rawValue = quoteConfValue(value)

    const active = this.findAssignment(key)
    if (active >= 0) {
      const parts = activeParts(this.lines[active], key)
      if (parts) {
        this.lines[active] = parseConfigLine(
          `${parts.indent}${parts.key}${parts.separator}${rawValue}${parts.trailing}`,
        )
      }
      return
    }

    const commented = this.findCommented(key)
    if (commented >= 0) {
      const line = this.lines[commented]
      if (line.kind === 'comment' && line.commented) {
        const parts = line.commented
        this.lines[commented] = parseConfigLine(
          `${parts.key}${parts.separator}${rawValue}${parts.trailing}`,
        )
      }
      return
    }

    this.lines.push(parseConfigLine(`${key} = ${rawValue}`))
    this.trailingNewline = true
  }

  /**
   * Comment out the first active assignment of `key`, appending
   * " #reason" when given. Returns false when there was nothing to disable.
   */
  disable(key: string, reason?: string): boolean {
    const index = this.findAssignment(key)
    if (index < 0) return false
    const line = this.lines[index]
    this.lines[index] = parseConfigLine(
      `#${line.text}${reason ? ` #${reason}` : ''}`,
    )
    return true
  }

  /**
   * Disable `oldKey` and insert `newKey = newValue` directly after it.
   * Returns false (and changes nothing) when `oldKey` is not set.
   */
  replace(
    oldKey: string,
    reason: string | undefined,
    newKey: string,
    newValue: string,
  ): boolean {
    assertValidKey(newKey)
    assertValidValue(newKey, newValue)
    const index = this.findAssignment(oldKey)
    if (index < 0) return false
    this.disable(oldKey, reason)
    this.lines.splice(
      index + 1,
      0,
      parseConfigLine(`${newKey} = ${quoteConfValue(newValue)}`),
    )
    return true
  }
}

/**
 * Replace `path` with `content` without ever exposing a half-written
 * file: write a sibling .new file, copy owner and mode, rename over.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const original = await stat(path)
  const tempPath = `${path}.new`

  try {
    await writeFile(tempPath, content)
    try {
      await chown(tempPath, original.uid, original.gid)
    } catch (error) {
      // unprivileged callers can only keep their own uid
      if (!isErrnoException(error) || error.code !== 'EPERM') throw error
      logDebug('Could not copy ownership onto rewritten file', { path })
    }
    await chmod(tempPath, original.mode & 0o7777)
    await rename(tempPath, path)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

/**
 * Apply an edit to a configuration file, writing it back atomically only
 * when the edit reports a change
 */
export async function editConfFile(
  path: string,
  edit: (doc: ConfigDocument) => boolean,
): Promise<boolean> {
  const doc = ConfigDocument.parse(await readFile(path, 'utf8'))
  if (!edit(doc)) return false
  await writeFileAtomic(path, doc.render())
  return true
}

export async function setConfFileValue(
  path: string,
  key: string,
  value: string,
): Promise<void> {
  await editConfFile(path, (doc) => {
    const before = doc.render()
    doc.set(key, value)
    return doc.render() !== before
  })
}

export async function disableConfFileValue(
  path: string,
  key: string,
  reason?: string,
): Promise<boolean> {
  return editConfFile(path, (doc) => doc.disable(key, reason))
}

export async function replaceConfFileValue(
  path: string,
  oldKey: string,
  reason: string | undefined,
  newKey: string,
  newValue: string,
): Promise<boolean> {
  return editConfFile(path, (doc) =>
    doc.replace(oldKey, reason, newKey, newValue),
  )
}

function resolveIncludePath(path: string, parentPath: string): string {
  return isAbsolute(path) ? path : join(dirname(parentPath), path)
}

async function readIncludeDir(dirPath: string): Promise<string[]> {
  try {
    const entries = await readdir(dirPath, { withFileTypes: true })
    return entries
      .filter(
        (entry) =>
          !entry.name.startsWith('.') &&
          entry.name.endsWith('.conf') &&
          (entry.isFile() || entry.isSymbolicLink()),
      )
      .map((entry) => entry.name)
      .sort()
  } catch (error) {
    if (isMissingFileError(error)) return []
    throw error
  }
}

async function readConfFileChain(
  path: string,
  chain: string[],
): Promise<ConfigMap> {
  const absolute = resolve(path)
  if (chain.includes(absolute)) {
    throw malformedConfigError(
      ErrorCodes.CONFIG_INCLUDE_CYCLE,
      `configuration file ${absolute} includes itself (via ${chain.join(' -> ')})`,
      absolute,
    )
  }
  if (chain.length >= defaults.maxIncludeDepth) {
    throw malformedConfigError(
      ErrorCodes.CONFIG_INCLUDE_CYCLE,
      `configuration includes nested deeper than ${defaults.maxIncludeDepth} levels at ${absolute}`,
      absolute,
    )
  }

  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFileError(error)) return {}
    throw error
  }

  const lowerKeys = path.endsWith('.conf')
  const nextChain = [...chain, absolute]
  const conf: ConfigMap = {}
  const doc = ConfigDocument.parse(text)

  let lineNumber = 0
  for (const line of doc.getLines()) {
    lineNumber++
    switch (line.kind) {
      case 'blank':
      case 'comment':
        break
      case 'invalid':
        throw malformedConfigError(
          ErrorCodes.CONFIG_MALFORMED,
          `invalid line ${lineNumber} in ${path}: ${line.text}`,
          path,
        )
      case 'assignment':
        conf[lowerKeys ? line.key.toLowerCase() : line.key] = line.value
        break
      case 'include': {
        const target = resolveIncludePath(line.path, path)
        if (line.directive === 'include_dir') {
          for (const file of await readIncludeDir(target)) {
            Object.assign(conf, await readConfFileChain(join(target, file), nextChain))
          }
        } else {
          Object.assign(conf, await readConfFileChain(target, nextChain))
        }
        break
      }
    }
  }

  return conf
}

/**
 * Read a "key = value" file with all includes merged in order, later
 * settings winning. Keys are lower-cased for *.conf files. A missing file
 * reads as an empty mapping.
 */
export async function readConfFile(path: string): Promise<ConfigMap> {
  return readConfFileChain(path, [])
}
