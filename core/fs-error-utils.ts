/**
 * Filesystem Error Utilities
 *
 * Error detection and the move/remove helpers used by rename, drop and
 * rollback.
 */

import { rename, cp, rm, lstat, mkdir, chown, chmod } from 'fs/promises'
import type { Owner } from '../types'
import { isErrnoException, isMissingFileError, logDebug } from './error-handler'

/**
 * Errors that make rename() fall back to copy + remove
 * - EXDEV: cross-device link (rename across filesystems)
 * - ENOTEMPTY: directory not empty (target exists with content)
 */
export function isRenameFallbackError(error: unknown): boolean {
  return (
    isErrnoException(error) &&
    (error.code === 'EXDEV' || error.code === 'ENOTEMPTY')
  )
}

/**
 * Move a file or directory from source to destination.
 * Uses rename() with a cp() + rm() fallback for cross-device moves.
 */
export async function moveEntry(
  sourcePath: string,
  destPath: string,
): Promise<void> {
  try {
    await rename(sourcePath, destPath)
  } catch (error) {
    if (!isRenameFallbackError(error)) throw error
    await cp(sourcePath, destPath, {
      recursive: true,
      force: true,
      preserveTimestamps: true,
      verbatimSymlinks: true,
    })
    try {
      await rm(sourcePath, { recursive: true, force: true })
    } catch (cleanupError) {
      // destination is complete at this point
      logDebug('Failed to clean up source after copy', {
        sourcePath,
        destPath,
        error:
          cleanupError instanceof Error
            ? cleanupError.message
            : String(cleanupError),
      })
    }
  }
}

/**
 * lstat-based existence check, so dangling symlinks count as existing
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path)
    return true
  } catch (error) {
    if (isMissingFileError(error)) return false
    throw error
  }
}

/**
 * Create a directory with its missing parents. Returns the top-most
 * directory that was created (to remove on rollback), or null when the
 * directory already existed. Only the leaf gets `owner` and `mode`.
 */
export async function ensureDirectory(
  path: string,
  options: { owner?: Owner | null; mode?: number } = {},
): Promise<string | null> {
  const created = (await mkdir(path, { recursive: true })) ?? null
  if (created !== null) {
    if (options.owner) await chown(path, options.owner.uid, options.owner.gid)
    if (options.mode !== undefined) await chmod(path, options.mode)
  }
  return created
}

/**
 * Check if an error indicates a port is already in use
 */
export function isPortInUseError(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'EADDRINUSE'
}

/**
 * Address family not configured on this host
 */
export function isFamilyUnavailableError(error: unknown): boolean {
  return (
    isErrnoException(error) &&
    (error.code === 'EAFNOSUPPORT' || error.code === 'EADDRNOTAVAIL')
  )
}
