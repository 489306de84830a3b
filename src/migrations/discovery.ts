import * as fs from 'fs/promises';
import * as path from 'path';
import type { DiscoveredMigration } from './types.js';
import { DiscoveryError } from '../utils/errors.js';

export const DEFAULT_EXTENSIONS: readonly string[] = ['.js', '.mjs', '.cjs'];

const MIGRATION_FILE_PATTERN = /^(\d+)_(.+)$/;

export interface DiscoveryOptions {
  /** File extensions treated as migrations, with the leading dot */
  extensions?: readonly string[];
}

/**
 * Parse the order prefix of a migration file name
 *
 * @example
 * parseMigrationOrder('0001_add_text_index.js') // 1
 * parseMigrationOrder('README.md') // undefined
 */
export function parseMigrationOrder(fileName: string): number | undefined {
  const match = MIGRATION_FILE_PATTERN.exec(fileName);
  if (!match) return undefined;
  return parseInt(match[1], 10);
}

/**
 * File name without its migration extension, used as the ledger name
 */
export function migrationNameFromFile(fileName: string): string {
  return path.basename(fileName, path.extname(fileName));
}

export function isMigrationFile(fileName: string, extensions: readonly string[] = DEFAULT_EXTENSIONS): boolean {
  if (fileName.startsWith('_') || fileName.startsWith('.')) return false;
  if (fileName.endsWith('.d.ts') || fileName.endsWith('.map')) return false;
  if (!extensions.includes(path.extname(fileName))) return false;
  return parseMigrationOrder(fileName) !== undefined;
}

/**
 * List the migrations of a directory, sorted by order.
 * Orders must be unique and run 1..N without gaps.
 */
export async function discoverMigrations(
  dir: string,
  options: DiscoveryOptions = {}
): Promise<DiscoveredMigration[]> {
  const extensions = options.extensions ?? DEFAULT_EXTENSIONS;

  let entries: string[];
  try {
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) {
      throw new DiscoveryError(`Migrations path is not a directory: ${dir}`);
    }
    entries = await fs.readdir(dir);
  } catch (error: unknown) {
    if (error instanceof DiscoveryError) throw error;
    throw new DiscoveryError(`Migrations directory not found at ${dir}`);
  }

  const migrations: DiscoveredMigration[] = [];
  for (const entry of entries) {
    if (!isMigrationFile(entry, extensions)) continue;
    const order = parseMigrationOrder(entry);
    if (order === undefined) continue;
    migrations.push({
      name: migrationNameFromFile(entry),
      order,
      file: path.join(dir, entry)
    });
  }

  migrations.sort((a, b) => a.order - b.order || a.name.localeCompare(b.name));
  assertSequential(migrations);

  return migrations;
}

/**
 * Fails on duplicate orders, orders below 1 and gaps in 1..N
 */
export function assertSequential(migrations: ReadonlyArray<{ name: string; order: number }>): void {
  const sorted = [...migrations].sort((a, b) => a.order - b.order);

  for (let i = 0; i < sorted.length; i++) {
    const current = sorted[i];
    const expected = i + 1;

    if (i > 0 && sorted[i - 1].order === current.order) {
      throw new DiscoveryError(
        `Duplicate migration order ${current.order}: ${sorted[i - 1].name} and ${current.name}`
      );
    }
    if (current.order < expected) {
      throw new DiscoveryError(`Unexpected migration order ${current.order} (${current.name})`);
    }
    if (current.order !== expected) {
      throw new DiscoveryError(
        `Missing migration with order ${expected} (next found: ${current.name})`
      );
    }
  }
}
