import type { Db } from 'mongodb';
import type { ApplyAllResult, ApplyOutcome, LedgerRecord, MigrationStatus, MigrationUnit } from './types.js';
import type { MigrationLedger } from './ledger.js';
import type { Logger } from '../utils/logger.js';
import { OperationError, PrerequisiteError } from '../utils/errors.js';

export interface MigrationManagerOptions<TDb> {
  /** Database handle passed to every migration; owned by the caller */
  db: TDb;
  ledger: MigrationLedger;
  logger: Logger;
}

/**
 * Applies and rolls back migrations against one database.
 *
 * Every ledger read, ledger write and migration call is awaited before the
 * next one starts. There is no lock: two runners against the same database
 * can both pass the prerequisite and "already applied" checks.
 */
export class MigrationManager<TDb = Db> {
  private readonly db: TDb;
  private readonly ledger: MigrationLedger;
  private readonly logger: Logger;

  constructor(options: MigrationManagerOptions<TDb>) {
    this.db = options.db;
    this.ledger = options.ledger;
    this.logger = options.logger;
  }

  /**
   * Apply a migration set in ascending order, stopping at the first failure
   */
  async applyAll(units: ReadonlyArray<MigrationUnit<TDb>>): Promise<ApplyAllResult> {
    const ordered = [...units].sort((a, b) => a.order - b.order);
    const result: ApplyAllResult = { applied: [], skipped: [] };

    this.logger.debug(`[MigrationManager] Applying ${ordered.length} migration(s): ${ordered.map(u => u.name).join(', ')}`);

    for (const unit of ordered) {
      const outcome = await this.applyOne(unit);
      result[outcome].push(unit.name);
    }

    this.logger.debug(`[MigrationManager] Run complete: ${result.applied.length} applied, ${result.skipped.length} skipped`);
    return result;
  }

  /**
   * Apply a single migration.
   * Requires the migration with the previous order to be in the ledger;
   * a migration already in the ledger is skipped.
   */
  async applyOne(unit: MigrationUnit<TDb>): Promise<ApplyOutcome> {
    if (unit.order > 1) {
      const previousOrder = unit.order - 1;
      const previous = await this.ledger.findByOrder(previousOrder);
      if (!previous) {
        throw new PrerequisiteError(unit.name, previousOrder);
      }
    }

    if (await this.ledger.isApplied(unit.name)) {
      this.logger.debug(`[MigrationManager] Migration ${unit.name} already applied, skipping`);
      return 'skipped';
    }

    this.logger.info(`Applying migration ${unit.name}...`);
    try {
      await unit.migration.up(this.db);
    } catch (error: unknown) {
      throw new OperationError(unit.name, 'apply', error);
    }

    await this.ledger.record(unit.name, unit.order);
    this.logger.success(`Migration ${unit.name} applied successfully.`);
    return 'applied';
  }

  /**
   * Roll back a single migration.
   * down() always runs; the ledger record is removed only when it succeeds.
   * @returns whether a ledger record was removed
   */
  async rollback(unit: MigrationUnit<TDb>): Promise<boolean> {
    this.logger.info(`Rolling back migration ${unit.name}...`);
    try {
      await unit.migration.down(this.db);
    } catch (error: unknown) {
      throw new OperationError(unit.name, 'rollback', error);
    }

    const removed = await this.ledger.remove(unit.name);
    if (!removed) {
      this.logger.warn(`Migration ${unit.name} had no ledger record`);
    }
    this.logger.success(`Migration ${unit.name} rolled back successfully.`);
    return removed;
  }

  /**
   * Applied / pending state of each migration, plus ledger records whose
   * migration is no longer in the set
   */
  async status(units: ReadonlyArray<MigrationUnit<TDb>>): Promise<MigrationStatus[]> {
    const records = await this.ledger.list();
    const byName = new Map<string, LedgerRecord>(records.map(r => [r.name, r]));

    const statuses: MigrationStatus[] = [...units]
      .sort((a, b) => a.order - b.order)
      .map((unit): MigrationStatus => {
        const record = byName.get(unit.name);
        byName.delete(unit.name);
        return record
          ? { name: unit.name, order: unit.order, state: 'applied', appliedAt: record.appliedAt }
          : { name: unit.name, order: unit.order, state: 'pending' };
      });

    for (const orphan of byName.values()) {
      statuses.push({ name: orphan.name, order: orphan.order, state: 'orphaned', appliedAt: orphan.appliedAt });
    }

    return statuses;
  }
}
