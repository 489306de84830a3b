/**
 * Migration system public API
 *
 * Migrations live in a `migrations` directory, one file per migration, named
 * `<order>_<description>.js` (e.g. `0001_add_text_index.js`). Each file
 * exports an object or class with `up(db)` and `down(db)`.
 *
 * Applications that bundle their migrations can skip the file loader and
 * register them in a MigrationRegistry instead:
 * ```typescript
 * const registry = new MigrationRegistry()
 *   .define(1, '0001_add_text_index', addTextIndex)
 *   .define(2, '0002_backfill_slugs', backfillSlugs);
 * await manager.applyAll(registry.getAll());
 * ```
 */

export { MigrationManager } from './manager.js';
export type { MigrationManagerOptions } from './manager.js';
export { MigrationRunner } from './runner.js';
export type { MigrationRunnerOptions } from './runner.js';
export { MigrationRegistry } from './registry.js';
export { MigrationLedger, MongoLedgerStore, DEFAULT_LEDGER_COLLECTION } from './ledger.js';
export type { LedgerStore, LedgerFilter } from './ledger.js';
export {
  discoverMigrations,
  parseMigrationOrder,
  migrationNameFromFile,
  isMigrationFile,
  assertSequential,
  DEFAULT_EXTENSIONS
} from './discovery.js';
export type { DiscoveryOptions } from './discovery.js';
export { loadMigration, loadMigrationSet, isMigration } from './loader.js';
export type { LoaderOptions, ModuleImporter } from './loader.js';
export { createMigrationFile, formatMigrationFileName, slugifyDescription } from './scaffold.js';
export type {
  Migration,
  MigrationUnit,
  DiscoveredMigration,
  LedgerRecord,
  ApplyOutcome,
  ApplyAllResult,
  MigrationStatus
} from './types.js';
