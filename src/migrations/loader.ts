import * as fs from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';
import type { Db } from 'mongodb';
import type { Migration, MigrationUnit } from './types.js';
import { MigrationRegistry } from './registry.js';
import { discoverMigrations, migrationNameFromFile, parseMigrationOrder, type DiscoveryOptions } from './discovery.js';
import { LoadError, getErrorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export type ModuleImporter = (file: string) => Promise<unknown>;

export interface LoaderOptions extends DiscoveryOptions {
  /** Replaces the dynamic import() of the migration file */
  importer?: ModuleImporter;
  logger?: Logger;
}

const EXPORT_NAMES = ['default', 'Migration', 'migration'] as const;

const defaultImporter: ModuleImporter = (file) => import(pathToFileURL(file).href);

type MigrationConstructor = new () => unknown;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isConstructor(value: unknown): value is MigrationConstructor {
  return typeof value === 'function' && isRecord(value.prototype);
}

/**
 * Type guard for an object implementing up() and down()
 */
export function isMigration<TDb = Db>(value: unknown): value is Migration<TDb> {
  return isRecord(value) && typeof value.up === 'function' && typeof value.down === 'function';
}

/**
 * Exports a migration module may use, in lookup order.
 * CommonJS modules expose module.exports as the default export, so its
 * properties are looked at as well.
 */
function exportCandidates(moduleNamespace: Record<string, unknown>): unknown[] {
  const candidates: unknown[] = EXPORT_NAMES.map(name => moduleNamespace[name]);
  const defaultExport = moduleNamespace.default;
  if (isRecord(defaultExport) && !isMigration(defaultExport)) {
    candidates.push(defaultExport.Migration, defaultExport.migration);
  }
  return candidates;
}

function instantiate(file: string, candidate: unknown): unknown {
  if (!isConstructor(candidate)) return candidate;
  try {
    return new candidate();
  } catch (error: unknown) {
    throw new LoadError(file, `constructor threw: ${getErrorMessage(error)}`, error);
  }
}

/**
 * Load a single migration file into a migration unit
 */
export async function loadMigration<TDb = Db>(
  file: string,
  options: LoaderOptions = {}
): Promise<MigrationUnit<TDb>> {
  const importer = options.importer ?? defaultImporter;
  const fileName = path.basename(file);

  const order = parseMigrationOrder(fileName);
  if (order === undefined) {
    throw new LoadError(file, 'file name must look like <order>_<description>.<ext>');
  }
  if (order < 1 || !Number.isSafeInteger(order)) {
    throw new LoadError(file, `order prefix "${fileName.split('_')[0]}" is not a positive integer`);
  }

  try {
    await fs.access(file);
  } catch {
    throw new LoadError(file, 'file not found');
  }

  options.logger?.debug(`[MigrationLoader] Importing ${file}`);

  let moduleNamespace: unknown;
  try {
    moduleNamespace = await importer(file);
  } catch (error: unknown) {
    throw new LoadError(file, `import failed: ${getErrorMessage(error)}`, error);
  }

  if (!isRecord(moduleNamespace)) {
    throw new LoadError(file, 'module did not evaluate to an object');
  }

  for (const candidate of exportCandidates(moduleNamespace)) {
    if (candidate === undefined) continue;
    const instance = instantiate(file, candidate);
    if (isMigration<TDb>(instance)) {
      return {
        name: migrationNameFromFile(fileName),
        order,
        file,
        migration: instance
      };
    }
  }

  throw new LoadError(
    file,
    'no migration export found (expected a default, Migration or migration export with up() and down())'
  );
}

/**
 * Discover and load every migration of a directory
 */
export async function loadMigrationSet<TDb = Db>(
  dir: string,
  options: LoaderOptions = {}
): Promise<MigrationRegistry<TDb>> {
  const discovered = await discoverMigrations(dir, options);
  options.logger?.debug(`[MigrationLoader] Found ${discovered.length} migration(s) in ${dir}`);

  const registry = new MigrationRegistry<TDb>();
  for (const entry of discovered) {
    registry.register(await loadMigration<TDb>(entry.file, options));
  }
  return registry;
}
