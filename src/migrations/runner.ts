import * as path from 'path';
import type { Db } from 'mongodb';
import type { ApplyAllResult, ApplyOutcome, MigrationStatus, MigrationUnit } from './types.js';
import type { MigrationManager } from './manager.js';
import { DEFAULT_EXTENSIONS } from './discovery.js';
import { loadMigration, loadMigrationSet, type ModuleImporter } from './loader.js';
import { LoadError } from '../utils/errors.js';
import { findMigrationFile, resolveMigrationsDir, MIGRATIONS_DIR_NAME } from '../utils/paths.js';
import type { Logger } from '../utils/logger.js';

export interface MigrationRunnerOptions<TDb> {
  manager: MigrationManager<TDb>;
  logger: Logger;
  /** Base directory module names are resolved against (default: process.cwd()) */
  cwd?: string;
  /** Name of the migrations directory inside a module */
  migrationsDir?: string;
  extensions?: readonly string[];
  importer?: ModuleImporter;
}

/**
 * Migration runner
 * Resolves migration files from module names and hands them to the manager
 */
export class MigrationRunner<TDb = Db> {
  private readonly manager: MigrationManager<TDb>;
  private readonly logger: Logger;
  private readonly cwd: string;
  private readonly migrationsDir: string;
  private readonly extensions: readonly string[];
  private readonly importer?: ModuleImporter;

  constructor(options: MigrationRunnerOptions<TDb>) {
    this.manager = options.manager;
    this.logger = options.logger;
    this.cwd = options.cwd ?? process.cwd();
    this.migrationsDir = options.migrationsDir ?? MIGRATIONS_DIR_NAME;
    this.extensions = options.extensions ?? DEFAULT_EXTENSIONS;
    this.importer = options.importer;
  }

  resolveMigrationsDir(moduleName?: string): string {
    return resolveMigrationsDir(moduleName, this.cwd, this.migrationsDir);
  }

  /**
   * Load every migration of a module, ascending by order
   */
  async loadAll(moduleName?: string): Promise<MigrationUnit<TDb>[]> {
    const dir = this.resolveMigrationsDir(moduleName);
    this.logger.debug(`[MigrationRunner] Loading migrations from ${dir}`);
    const registry = await loadMigrationSet<TDb>(dir, {
      extensions: this.extensions,
      importer: this.importer,
      logger: this.logger
    });
    return registry.getAll();
  }

  /**
   * Load one migration by name (with or without extension)
   */
  async loadNamed(moduleName: string | undefined, migrationName: string): Promise<MigrationUnit<TDb>> {
    const dir = this.resolveMigrationsDir(moduleName);
    const file = await findMigrationFile(dir, migrationName, this.extensions);
    if (!file) {
      throw new LoadError(path.join(dir, migrationName), 'file not found');
    }
    return loadMigration<TDb>(file, {
      extensions: this.extensions,
      importer: this.importer,
      logger: this.logger
    });
  }

  async migrateAll(moduleName?: string): Promise<ApplyAllResult> {
    const units = await this.loadAll(moduleName);
    if (units.length === 0) {
      this.logger.info('No migrations found');
      return { applied: [], skipped: [] };
    }

    const result = await this.manager.applyAll(units);
    if (result.applied.length === 0) {
      this.logger.info('Database is up to date');
    } else {
      this.logger.info(`${result.applied.length} migration(s) applied`);
    }
    return result;
  }

  async migrateOne(moduleName: string | undefined, migrationName: string): Promise<ApplyOutcome> {
    const unit = await this.loadNamed(moduleName, migrationName);
    const outcome = await this.manager.applyOne(unit);
    if (outcome === 'skipped') {
      this.logger.info(`Migration ${unit.name} is already applied`);
    }
    return outcome;
  }

  async rollback(moduleName: string | undefined, migrationName: string): Promise<boolean> {
    const unit = await this.loadNamed(moduleName, migrationName);
    return this.manager.rollback(unit);
  }

  async status(moduleName?: string): Promise<MigrationStatus[]> {
    const units = await this.loadAll(moduleName);
    return this.manager.status(units);
  }
}
