/**
 * Error Handler
 *
 * Centralized error handling with proper logging and user feedback.
 * - CLI commands print a single "Error: ..." line and exit 1
 * - Every entry is also appended as JSON to ~/.pgcluster/pgcluster.log
 *   (PGCLUSTER_LOG_FILE moves it, PGCLUSTER_LOG_FILE=off disables it)
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs'
import { dirname, join } from 'path'
import chalk from 'chalk'

function getDefaultLogPath(): string | null {
  const override = process.env.PGCLUSTER_LOG_FILE
  if (override === 'off') return null
  if (override) return override
  const home = process.env.HOME || process.env.USERPROFILE || ''
  if (!home) return null
  return join(home, '.pgcluster', 'pgcluster.log')
}

let logFilePath: string | null | undefined

/**
 * Point structured logging at another file, or turn it off with null
 */
export function configureLogFile(path: string | null): void {
  logFilePath = path
}

function getLogPath(): string | null {
  if (logFilePath === undefined) {
    logFilePath = getDefaultLogPath()
  }
  return logFilePath
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info'

/**
 * Broad failure classes; each maps to one handling policy
 */
export type ErrorCategory =
  | 'usage'
  | 'validation'
  | 'external-tool'
  | 'filesystem'
  | 'malformed-config'
  | 'race'
  | 'internal'

export type PgClusterErrorInfo = {
  code: string
  message: string
  severity: ErrorSeverity
  suggestion?: string
  context?: Record<string, unknown>
}

export const ErrorCodes = {
  // Usage errors
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',

  // Validation errors
  INVALID_CLUSTER_NAME: 'INVALID_CLUSTER_NAME',
  INVALID_VERSION: 'INVALID_VERSION',
  VERSION_NOT_INSTALLED: 'VERSION_NOT_INSTALLED',
  CLUSTER_NOT_FOUND: 'CLUSTER_NOT_FOUND',
  CLUSTER_ALREADY_EXISTS: 'CLUSTER_ALREADY_EXISTS',
  CLUSTER_RUNNING: 'CLUSTER_RUNNING',
  CLUSTER_NOT_RUNNING: 'CLUSTER_NOT_RUNNING',
  CLUSTER_INFO_MISSING: 'CLUSTER_INFO_MISSING',
  OWNERSHIP_INVALID: 'OWNERSHIP_INVALID',
  DATA_VERSION_MISMATCH: 'DATA_VERSION_MISMATCH',
  START_DISABLED: 'START_DISABLED',
  CLUSTER_IN_RECOVERY: 'CLUSTER_IN_RECOVERY',

  // Port errors
  PORT_INVALID: 'PORT_INVALID',
  PORT_IN_USE: 'PORT_IN_USE',
  PORT_RANGE_EXHAUSTED: 'PORT_RANGE_EXHAUSTED',
  NO_PROTOCOL_AVAILABLE: 'NO_PROTOCOL_AVAILABLE',

  // External tool errors
  TOOL_NOT_FOUND: 'TOOL_NOT_FOUND',
  TOOL_FAILED: 'TOOL_FAILED',
  HOOK_FAILED: 'HOOK_FAILED',

  // Configuration errors
  CONFIG_MALFORMED: 'CONFIG_MALFORMED',
  CONFIG_INCLUDE_CYCLE: 'CONFIG_INCLUDE_CYCLE',
  START_CONF_INVALID: 'START_CONF_INVALID',

  // Backup errors
  BACKUP_NOT_FOUND: 'BACKUP_NOT_FOUND',
  BACKUP_LOCKED: 'BACKUP_LOCKED',

  // Rollback errors
  ROLLBACK_FAILED: 'ROLLBACK_FAILED',

  // General errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  FILESYSTEM_ERROR: 'FILESYSTEM_ERROR',
} as const

export class PgClusterError extends Error {
  public readonly code: string
  public readonly category: ErrorCategory
  public readonly severity: ErrorSeverity
  public readonly suggestion?: string
  public readonly context?: Record<string, unknown>

  constructor(
    code: string,
    message: string,
    category: ErrorCategory = 'internal',
    suggestion?: string,
    context?: Record<string, unknown>,
    severity: ErrorSeverity = 'error',
  ) {
    super(message)
    this.name = 'PgClusterError'
    this.code = code
    this.category = category
    this.severity = severity
    this.suggestion = suggestion
    this.context = context

    Error.captureStackTrace(this, PgClusterError)
  }

  /**
   * Create PgClusterError from an unknown error.
   * Node errno errors become filesystem errors carrying their path.
   */
  static from(
    error: unknown,
    code: string = ErrorCodes.UNKNOWN_ERROR,
    suggestion?: string,
  ): PgClusterError {
    if (error instanceof PgClusterError) {
      return error
    }

    if (isErrnoException(error)) {
      const fsCode =
        error.code === 'ENOENT'
          ? ErrorCodes.FILE_NOT_FOUND
          : error.code === 'EACCES' || error.code === 'EPERM'
            ? ErrorCodes.PERMISSION_DENIED
            : ErrorCodes.FILESYSTEM_ERROR
      return new PgClusterError(
        fsCode,
        error.message,
        'filesystem',
        suggestion,
        { path: error.path, errno: error.code },
      )
    }

    const message = error instanceof Error ? error.message : String(error)

    return new PgClusterError(code, message, 'internal', suggestion, {
      originalError: error instanceof Error ? error.stack : undefined,
    })
  }
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    !(error instanceof PgClusterError) &&
    'code' in error &&
    typeof error.code === 'string'
  )
}

/**
 * True for ENOENT/ENOTDIR, the errors a vanished file produces
 */
export function isMissingFileError(error: unknown): boolean {
  return (
    isErrnoException(error) &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}

function ensureLogDirectory(logPath: string): void {
  const logDir = dirname(logPath)
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true })
  }
}

/**
 * Append a structured log entry to the log file
 */
function appendToLogFile(entry: PgClusterErrorInfo): void {
  const logPath = getLogPath()
  if (!logPath) return
  try {
    ensureLogDirectory(logPath)
    const logEntry = {
      timestamp: new Date().toISOString(),
      ...entry,
    }
    appendFileSync(logPath, JSON.stringify(logEntry) + '\n')
  } catch {
    // best effort
  }
}

function formatSeverity(severity: ErrorSeverity): string {
  switch (severity) {
    case 'fatal':
      return chalk.red.bold('[FATAL]')
    case 'error':
      return chalk.red('[ERROR]')
    case 'warning':
      return chalk.yellow('[WARN]')
    case 'info':
      return chalk.blue('[INFO]')
  }
}

/**
 * Log an error to console and log file
 */
export function logError(error: PgClusterErrorInfo): void {
  const prefix = formatSeverity(error.severity)
  console.error(`${prefix} [${error.code}] ${error.message}`)

  if (error.suggestion) {
    console.error(chalk.yellow(`  Suggestion: ${error.suggestion}`))
  }

  appendToLogFile(error)
}

/**
 * Record a PgClusterError in the log file only. The CLI prints the
 * one-line message itself.
 */
export function recordPgClusterError(error: PgClusterError): void {
  appendToLogFile({
    code: error.code,
    message: error.message,
    severity: error.severity,
    suggestion: error.suggestion,
    context: { category: error.category, ...error.context },
  })
}

/**
 * Log a warning (non-blocking, yellow output on stderr)
 */
export function logWarning(
  message: string,
  context?: Record<string, unknown>,
): void {
  console.warn(chalk.yellow(`Warning: ${message}`))

  appendToLogFile({
    code: 'WARNING',
    message,
    severity: 'warning',
    context,
  })
}

export function logInfo(
  message: string,
  context?: Record<string, unknown>,
): void {
  appendToLogFile({
    code: 'INFO',
    message,
    severity: 'info',
    context,
  })
}

/**
 * Log a debug message (only to file, not console)
 */
export function logDebug(
  message: string,
  context?: Record<string, unknown>,
): void {
  appendToLogFile({
    code: 'DEBUG',
    message,
    severity: 'info',
    context,
  })
}

export function usageError(message: string, suggestion?: string): PgClusterError {
  return new PgClusterError(
    ErrorCodes.INVALID_ARGUMENTS,
    message,
    'usage',
    suggestion,
  )
}

export function validationError(
  code: string,
  message: string,
  context?: Record<string, unknown>,
  suggestion?: string,
): PgClusterError {
  return new PgClusterError(code, message, 'validation', suggestion, context)
}

export function clusterNotFoundError(
  version: string,
  name: string,
): PgClusterError {
  return validationError(
    ErrorCodes.CLUSTER_NOT_FOUND,
    `cluster ${version}/${name} does not exist`,
    { version, cluster: name },
    'Run "pgcluster list" to see available clusters',
  )
}

export function clusterExistsError(
  version: string,
  name: string,
): PgClusterError {
  return validationError(
    ErrorCodes.CLUSTER_ALREADY_EXISTS,
    `cluster configuration already exists for ${version}/${name}`,
    { version, cluster: name },
  )
}

export function clusterRunningError(
  version: string,
  name: string,
): PgClusterError {
  return validationError(
    ErrorCodes.CLUSTER_RUNNING,
    `cluster ${version}/${name} is still running`,
    { version, cluster: name },
    'Stop it first or pass --stop',
  )
}

export function portInUseError(port: number, holder: string): PgClusterError {
  return validationError(
    ErrorCodes.PORT_IN_USE,
    `port ${port} is already used by cluster ${holder}`,
    { port, holder },
    'Choose a different port with -p, or omit it to pick the next free one',
  )
}

export function externalToolError(
  tool: string,
  exitCode: number | null,
  output: string,
): PgClusterError {
  const detail = output.trim()
  return new PgClusterError(
    ErrorCodes.TOOL_FAILED,
    `${tool} failed with exit code ${exitCode ?? 'unknown'}${detail ? `: ${detail}` : ''}`,
    'external-tool',
    undefined,
    { tool, exitCode },
  )
}

export function toolNotFoundError(
  program: string,
  version?: string,
): PgClusterError {
  return new PgClusterError(
    ErrorCodes.TOOL_NOT_FOUND,
    version ? `${program} for version ${version} not found` : `${program} not found`,
    'external-tool',
    version ? `Install the PostgreSQL ${version} server package` : undefined,
    { program, version },
  )
}

export function filesystemError(
  message: string,
  path: string,
  cause?: unknown,
): PgClusterError {
  return new PgClusterError(
    ErrorCodes.FILESYSTEM_ERROR,
    message,
    'filesystem',
    undefined,
    {
      path,
      cause: cause instanceof Error ? cause.message : undefined,
    },
  )
}

export function malformedConfigError(
  code: string,
  message: string,
  path: string,
): PgClusterError {
  return new PgClusterError(code, message, 'malformed-config', undefined, {
    path,
  })
}

/**
 * Cluster names become directory names; refuse anything that could
 * escape the version directory
 */
export function isValidClusterName(name: string): boolean {
  return /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/.test(name)
}

export function assertValidClusterName(name: string): void {
  if (!isValidClusterName(name)) {
    throw validationError(
      ErrorCodes.INVALID_CLUSTER_NAME,
      `invalid cluster name "${name}"`,
      { cluster: name },
      'Cluster names may contain letters, digits, "_", "." and "-", and must not start with "." or "-"',
    )
  }
}
