/**
 * Path Utilities
 *
 * - Migrations directory resolution from a module name
 * - Migration file lookup by name
 * - Directory traversal checks
 * - ESM module path utilities
 */

import path from 'path';
import { access } from 'fs/promises';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

export const MIGRATIONS_DIR_NAME = 'migrations';

// ============================================================================
// Migrations Directory Resolution
// ============================================================================

/**
 * Resolve the migrations directory of a module
 *
 * Dots in the module name are treated as path separators, so a module can be
 * given either as a dotted name or as a relative path.
 *
 * @param moduleName - Module containing the migrations directory (optional)
 * @param cwd - Base directory (default: process.cwd())
 * @returns Absolute path to the migrations directory
 *
 * @example
 * // Running from /srv/app
 * resolveMigrationsDir('backend.core')
 * // Returns: '/srv/app/backend/core/migrations'
 *
 * @example
 * resolveMigrationsDir()
 * // Returns: '/srv/app/migrations'
 */
export function resolveMigrationsDir(
  moduleName?: string,
  cwd: string = process.cwd(),
  dirName: string = MIGRATIONS_DIR_NAME
): string {
  if (!moduleName) {
    return path.join(cwd, dirName);
  }
  const modulePath = moduleName.split('.').join(path.sep);
  return path.join(cwd, modulePath, dirName);
}

/**
 * Candidate file paths for a migration name
 *
 * A name that already carries one of the extensions is used as is; otherwise
 * each extension is tried in order.
 *
 * @example
 * migrationFileCandidates('/srv/app/migrations', '0001_init', ['.js', '.mjs'])
 * // Returns: ['/srv/app/migrations/0001_init.js', '/srv/app/migrations/0001_init.mjs']
 */
export function migrationFileCandidates(
  migrationsDir: string,
  migrationName: string,
  extensions: readonly string[]
): string[] {
  if (extensions.includes(path.extname(migrationName))) {
    return [path.join(migrationsDir, migrationName)];
  }
  return extensions.map(ext => path.join(migrationsDir, `${migrationName}${ext}`));
}

/**
 * First existing migration file for a name, or undefined
 */
export async function findMigrationFile(
  migrationsDir: string,
  migrationName: string,
  extensions: readonly string[]
): Promise<string | undefined> {
  for (const candidate of migrationFileCandidates(migrationsDir, migrationName, extensions)) {
    if (!isPathWithinDirectory(migrationsDir, candidate)) {
      continue;
    }
    try {
      await access(candidate);
      return candidate;
    } catch {
      // try the next extension
    }
  }
  return undefined;
}

// ============================================================================
// Security Checks
// ============================================================================

/**
 * Check whether a resolved path stays inside a directory
 *
 * @example
 * isPathWithinDirectory('/srv/app/migrations', '/srv/app/migrations/0001_init.js')
 * // Returns: true
 *
 * @example
 * isPathWithinDirectory('/srv/app/migrations', '/srv/app/migrations/../settings.js')
 * // Returns: false
 */
export function isPathWithinDirectory(workingDir: string, resolvedPath: string): boolean {
  const relative = path.relative(workingDir, resolvedPath);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

// ============================================================================
// ESM Module Path Utilities
// ============================================================================

/**
 * Get the directory name of the current module (ESM equivalent of __dirname)
 *
 * @param importMetaUrl - Pass import.meta.url from the calling module
 */
export function getDirname(importMetaUrl: string): string {
  return dirname(fileURLToPath(importMetaUrl));
}
