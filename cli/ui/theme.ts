import chalk from 'chalk'
import type { ClusterInfo } from '../../types'

/**
 * Color theme for the pgcluster CLI
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,

  // Status colors
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,

  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic helpers
  clusterName: chalk.cyan.bold,
  version: chalk.yellow,
  port: chalk.green,
  path: chalk.gray,
  command: chalk.cyan,

  // Status badges
  online: chalk.green.bold('● online'),
  down: chalk.gray('○ down'),
  recovery: chalk.blue('◐ recovery'),

  icons: {
    success: chalk.green('✔'),
    error: chalk.red('✖'),
    warning: chalk.yellow('⚠'),
    info: chalk.blue('ℹ'),
    arrow: chalk.cyan('→'),
    bullet: chalk.gray('•'),
  },
}

export function uiSuccess(message: string): string {
  return `${theme.icons.success} ${message}`
}

/**
 * The single-line form every failing command prints on stderr
 */
export function uiError(message: string): string {
  return chalk.red(`Error: ${message}`)
}

export function uiWarning(message: string): string {
  return `${theme.icons.warning} ${chalk.yellow(message)}`
}

export function uiInfo(message: string): string {
  return `${theme.icons.info} ${message}`
}

export function keyValue(key: string, value: string): string {
  return `${chalk.gray(key + ':')} ${value}`
}

/**
 * Strip ANSI escape codes to get actual string length
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '')
}

/**
 * Pad a string (accounting for ANSI codes) to a specific visible width
 */
function padToWidth(str: string, width: number): string {
  const visibleLength = stripAnsi(str).length
  return str + ' '.repeat(Math.max(0, width - visibleLength))
}

export function statusBadge(info: ClusterInfo): string {
  if (!info.running) return theme.down
  return info.recovery ? theme.recovery : theme.online
}

/**
 * Render rows as aligned columns; the first row is the header
 */
export function table(rows: string[][]): string {
  const widths: number[] = []
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, stripAnsi(cell).length)
    })
  }
  return rows
    .map((row, rowIndex) => {
      const line = row
        .map((cell, index) =>
          index === row.length - 1 ? cell : padToWidth(cell, widths[index]),
        )
        .join('  ')
      return rowIndex === 0 ? chalk.bold(line) : line
    })
    .join('\n')
}

/**
 * Create a box with dynamic width based on content
 */
export function box(lines: string[], padding: number = 2): string {
  const maxWidth = Math.max(...lines.map((line) => stripAnsi(line).length))
  const horizontalLine = '─'.repeat(maxWidth + padding * 2)

  const boxLines = [chalk.cyan('┌' + horizontalLine + '┐')]
  for (const line of lines) {
    boxLines.push(
      chalk.cyan('│') +
        ' '.repeat(padding) +
        padToWidth(line, maxWidth) +
        ' '.repeat(padding) +
        chalk.cyan('│'),
    )
  }
  boxLines.push(chalk.cyan('└' + horizontalLine + '┘'))
  return boxLines.join('\n')
}

/**
 * Summary shown after create, upgrade and restore
 */
export function clusterBox(title: string, info: ClusterInfo): string {
  return box([
    `${theme.icons.success} ${title}`,
    '',
    keyValue('Cluster', theme.clusterName(`${info.version}/${info.name}`)),
    keyValue('Port', theme.port(String(info.port))),
    keyValue('Status', statusBadge(info)),
    keyValue('Data directory', theme.path(info.dataDir ?? '(unknown)')),
    keyValue('Log file', theme.path(info.logFile)),
  ])
}
