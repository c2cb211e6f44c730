/**
 * pg_hba.conf handling
 *
 * Only what cluster creation and upgrades need: parsing rules for
 * inspection, placing the administrative superuser rule, and rewriting
 * trust rules for servers whose initdb cannot set auth methods itself.
 */

import { readFile } from 'fs/promises'
import { isMissingFileError } from './error-handler'

export type HbaConnectionType = 'local' | 'host' | 'hostssl' | 'hostnossl'

export type HbaEntry = {
  // comment covers blank lines too; null marks an unparseable line
  type: 'comment' | HbaConnectionType | null
  line: string
  db?: string
  user?: string
  ip?: string
  mask?: string
  method?: string
}

const HBA_METHODS = new Set([
  'trust',
  'reject',
  'md5',
  'scram-sha-256',
  'password',
  'gss',
  'sspi',
  'ident',
  'peer',
  'pam',
  'ldap',
  'radius',
  'cert',
  'crypt',
  'krb5',
])

export function isValidHbaMethod(method: string): boolean {
  return HBA_METHODS.has(method)
}

export function parseHbaLine(line: string): HbaEntry {
  if (/^\s*($|#)/.test(line)) {
    return { type: 'comment', line }
  }

  const invalid: HbaEntry = { type: null, line }
  const tokens = line.trim().split(/\s+/)
  if (tokens.length < 4) return invalid

  const [type, db, user, ...rest] = tokens

  if (type === 'local') {
    if (rest.length > 2 || !isValidHbaMethod(rest[0])) return invalid
    return { type, line, db, user, method: rest.join(' ') }
  }

  if (type === 'host' || type === 'hostssl' || type === 'hostnossl') {
    const address = rest.shift()
    if (!address) return invalid
    const [ip, cidr] = address.split('/')
    if (!ip) return invalid
    let mask: string | undefined
    if (cidr !== undefined) {
      if (!/^\d+$/.test(cidr)) return invalid
      mask = cidr
    } else {
      mask = rest.shift()
    }
    if (rest.length === 0 || rest.length > 2 || !isValidHbaMethod(rest[0])) {
      return invalid
    }
    return { type, line, db, user, ip, mask, method: rest.join(' ') }
  }

  return invalid
}

/**
 * Parse a pg_hba.conf file; null when it does not exist
 */
export async function readHbaFile(path: string): Promise<HbaEntry[] | null> {
  try {
    const text = await readFile(path, 'utf8')
    const lines = text.endsWith('\n') ? text.slice(0, -1).split('\n') : text.split('\n')
    return lines.map(parseHbaLine)
  } catch (error) {
    if (isMissingFileError(error)) return null
    throw error
  }
}

export function superuserRuleBlock(owner: string): string[] {
  return [
    '# DO NOT DISABLE!',
    '# If you change this first entry you will need to make sure that the',
    '# database superuser can access the database using some other method.',
    '# Noninteractive access to all databases is required during automatic',
    '# maintenance (custom daily cronjobs, replication, and similar tasks).',
    '#',
    '# Database administrative login by Unix domain socket',
    `local   all             ${owner}                                peer`,
    '',
  ]
}

/**
 * Insert the administrative peer rule for `owner` before the first rule
 * of the file, so automation running as the owner can always connect
 */
export function injectSuperuserRule(text: string, owner: string): string {
  const lines = text.split('\n')
  let index = lines.findIndex((line) => !/^\s*($|#)/.test(line))
  if (index < 0) {
    index = text.endsWith('\n') ? lines.length - 1 : lines.length
  }
  lines.splice(index, 0, ...superuserRuleBlock(owner))
  return lines.join('\n')
}

/**
 * Replace the method of every trust rule: local rules get `localMethod`,
 * host rules `hostMethod`. Other lines are untouched.
 */
export function rewriteTrustRules(
  text: string,
  localMethod: string,
  hostMethod: string,
): string {
  return text
    .split('\n')
    .map((line) => {
      const entry = parseHbaLine(line)
      if (entry.type === null || entry.type === 'comment' || entry.method !== 'trust') {
        return line
      }
      const method = entry.type === 'local' ? localMethod : hostMethod
      return line.replace(/\btrust(\s*)$/, `${method}$1`)
    })
    .join('\n')
}

/**
 * Rules letting only `owner` in through the Unix socket; used while a
 * cluster is started temporarily during an upgrade
 */
export function restrictedHbaRules(owner: string): string {
  return `local all ${owner} ident\n`
}
