import type { Db } from 'mongodb';
import type { Migration, MigrationUnit } from './types.js';
import { assertSequential } from './discovery.js';
import { DiscoveryError } from '../utils/errors.js';

/**
 * Ordered table of migrations keyed by their order number
 *
 * Filled either by the loader from a migrations directory, or statically by
 * an application that compiles its migrations in and registers each one.
 */
export class MigrationRegistry<TDb = Db> {
  private units = new Map<number, MigrationUnit<TDb>>();

  /**
   * Register a migration
   * Fails when its order or its name is already taken
   */
  register(unit: MigrationUnit<TDb>): this {
    if (!Number.isInteger(unit.order) || unit.order < 1) {
      throw new DiscoveryError(`Invalid order ${unit.order} for migration ${unit.name}`);
    }

    const existing = this.units.get(unit.order);
    if (existing) {
      throw new DiscoveryError(
        `Duplicate migration order ${unit.order}: ${existing.name} and ${unit.name}`
      );
    }
    if (this.get(unit.name)) {
      throw new DiscoveryError(`Duplicate migration name: ${unit.name}`);
    }

    this.units.set(unit.order, unit);
    return this;
  }

  define(order: number, name: string, migration: Migration<TDb>): this {
    return this.register({ order, name, migration });
  }

  /**
   * All migrations, ascending by order
   */
  getAll(): MigrationUnit<TDb>[] {
    return [...this.units.values()].sort((a, b) => a.order - b.order);
  }

  get(name: string): MigrationUnit<TDb> | undefined {
    for (const unit of this.units.values()) {
      if (unit.name === name) return unit;
    }
    return undefined;
  }

  getByOrder(order: number): MigrationUnit<TDb> | undefined {
    return this.units.get(order);
  }

  get size(): number {
    return this.units.size;
  }

  /**
   * Fails unless the registered orders are exactly 1..N
   */
  assertContiguous(): void {
    assertSequential(this.getAll());
  }

  clear(): void {
    this.units.clear();
  }
}
