import type { Collection, Db } from 'mongodb';
import type { LedgerRecord } from './types.js';
import type { Logger } from '../utils/logger.js';

export const DEFAULT_LEDGER_COLLECTION = 'migrations';

export type LedgerFilter = { name: string } | { order: number };

/**
 * Storage behind the ledger
 * One document per applied migration
 */
export interface LedgerStore {
  findOne(filter: LedgerFilter): Promise<LedgerRecord | null>;
  insertOne(record: LedgerRecord): Promise<void>;
  /** Returns the number of removed records (0 or 1) */
  deleteOne(filter: LedgerFilter): Promise<number>;
  /** All records, ascending by order */
  findAll(): Promise<LedgerRecord[]>;
}

/**
 * Ledger store backed by a MongoDB collection
 */
export class MongoLedgerStore implements LedgerStore {
  constructor(private readonly collection: Collection<LedgerRecord>) {}

  static fromDb(db: Db, collectionName: string = DEFAULT_LEDGER_COLLECTION): MongoLedgerStore {
    return new MongoLedgerStore(db.collection<LedgerRecord>(collectionName));
  }

  async findOne(filter: LedgerFilter): Promise<LedgerRecord | null> {
    const doc = await this.collection.findOne(filter);
    if (!doc) return null;
    return toRecord(doc);
  }

  async insertOne(record: LedgerRecord): Promise<void> {
    // insertOne adds _id to the document it is given
    await this.collection.insertOne({ ...record });
  }

  async deleteOne(filter: LedgerFilter): Promise<number> {
    const result = await this.collection.deleteOne(filter);
    return result.deletedCount;
  }

  async findAll(): Promise<LedgerRecord[]> {
    const docs = await this.collection.find({}).sort({ order: 1 }).toArray();
    return docs.map(toRecord);
  }
}

function toRecord(doc: LedgerRecord): LedgerRecord {
  return {
    name: doc.name,
    order: doc.order,
    applied: doc.applied,
    appliedAt: doc.appliedAt
  };
}

/**
 * Ledger of applied migrations
 * Single source of truth for "has X been applied" and "highest applied order"
 */
export class MigrationLedger {
  constructor(
    private readonly store: LedgerStore,
    private readonly logger?: Logger
  ) {}

  async findByName(name: string): Promise<LedgerRecord | null> {
    return this.store.findOne({ name });
  }

  async findByOrder(order: number): Promise<LedgerRecord | null> {
    return this.store.findOne({ order });
  }

  async isApplied(name: string): Promise<boolean> {
    return (await this.findByName(name)) !== null;
  }

  async record(name: string, order: number, appliedAt: Date = new Date()): Promise<LedgerRecord> {
    const record: LedgerRecord = { name, order, applied: true, appliedAt };
    this.logger?.debug(`[MigrationLedger] Recording migration ${name} (order: ${order})`);
    await this.store.insertOne(record);
    return record;
  }

  /**
   * Remove the record of a migration
   * Removing an absent record is not an error
   */
  async remove(name: string): Promise<boolean> {
    const deleted = await this.store.deleteOne({ name });
    this.logger?.debug(`[MigrationLedger] Removed ${deleted} record(s) for ${name}`);
    return deleted > 0;
  }

  async list(): Promise<LedgerRecord[]> {
    return this.store.findAll();
  }

  /**
   * Highest applied order, 0 on an empty ledger
   */
  async highestOrder(): Promise<number> {
    const records = await this.list();
    return records.reduce((max, r) => Math.max(max, r.order), 0);
  }
}
