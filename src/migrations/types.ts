/**
 * Migration system types
 * Sequential migrations for a MongoDB database, tracked in a ledger collection
 */

import type { Db } from 'mongodb';

/**
 * Migration interface
 * Each migration file exports one implementation of it
 */
export interface Migration<TDb = Db> {
  /** Human-readable description */
  description?: string;

  /** Forward changes (e.g. create an index) */
  up(db: TDb): Promise<void>;

  /** Exact inverse of up() */
  down(db: TDb): Promise<void>;
}

/**
 * A migration with its identity inside a migration set
 */
export interface MigrationUnit<TDb = Db> {
  /** Unique name, the file stem for discovered migrations (e.g. '0001_add_text_index') */
  name: string;

  /** Integer prefix of the file name ('0001' → 1) */
  order: number;

  /** Absolute path the migration was loaded from */
  file?: string;

  migration: Migration<TDb>;
}

/**
 * A migration file found by discovery, not loaded yet
 */
export interface DiscoveredMigration {
  name: string;
  order: number;
  file: string;
}

/**
 * Ledger document, one per applied migration
 */
export interface LedgerRecord {
  name: string;
  order: number;
  applied: true;
  appliedAt: Date;
}

export type ApplyOutcome = 'applied' | 'skipped';

/**
 * Result of a batch run
 */
export interface ApplyAllResult {
  applied: string[];
  skipped: string[];
}

export interface MigrationStatus {
  name: string;
  order: number;
  state: 'applied' | 'pending' | 'orphaned';
  appliedAt?: Date;
}
