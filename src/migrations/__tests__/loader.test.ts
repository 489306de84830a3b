/**
 * Migration loader tests
 *
 * Loads real migration modules from tests/fixtures; export shapes that are
 * awkward to write as fixtures go through an injected importer
 */

import { describe, it, expect, vi } from 'vitest';
import { join } from 'path';
import { loadMigration, loadMigrationSet, isMigration, type ModuleImporter } from '../loader.js';
import { LoadError } from '../../utils/errors.js';
import { getDirname } from '../../utils/paths.js';

const FIXTURES = join(getDirname(import.meta.url), '../../../tests/fixtures');
const MIGRATIONS_DIR = join(FIXTURES, 'migrations');
const INVALID_DIR = join(FIXTURES, 'invalid');

describe('Migration loader', () => {
  describe('isMigration', () => {
    it('should accept objects with up and down functions', () => {
      expect(isMigration({ up: async () => {}, down: async () => {} })).toBe(true);
    });

    it('should reject anything else', () => {
      expect(isMigration(null)).toBe(false);
      expect(isMigration({ up: async () => {} })).toBe(false);
      expect(isMigration({ up: 'no', down: 'no' })).toBe(false);
      expect(isMigration(() => {})).toBe(false);
    });
  });

  describe('loadMigration', () => {
    it('should load a default export object', async () => {
      const file = join(MIGRATIONS_DIR, '0001_create_users_index.js');

      const unit = await loadMigration(file);

      expect(unit.name).toBe('0001_create_users_index');
      expect(unit.order).toBe(1);
      expect(unit.file).toBe(file);
      expect(unit.migration.description).toBe('Create unique index on users.email');
    });

    it('should instantiate an exported Migration class', async () => {
      const unit = await loadMigration(join(MIGRATIONS_DIR, '0002_add_posts_text_index.mjs'));

      expect(unit.name).toBe('0002_add_posts_text_index');
      expect(unit.order).toBe(2);
      expect(isMigration(unit.migration)).toBe(true);
    });

    it('should load a named migration object', async () => {
      const unit = await loadMigration(join(MIGRATIONS_DIR, '0003_backfill_status.mjs'));

      expect(unit.order).toBe(3);
      expect(isMigration(unit.migration)).toBe(true);
    });

    it('should run the loaded migration against the given handle', async () => {
      const createIndex = vi.fn(async () => 'email_1');
      const db = { collection: vi.fn(() => ({ createIndex })) };

      const unit = await loadMigration<typeof db>(join(MIGRATIONS_DIR, '0001_create_users_index.js'));
      await unit.migration.up(db);

      expect(db.collection).toHaveBeenCalledWith('users');
      expect(createIndex).toHaveBeenCalledWith({ email: 1 }, { unique: true });
    });

    it('should fail for a missing file', async () => {
      const file = join(MIGRATIONS_DIR, '0009_missing.js');

      await expect(loadMigration(file)).rejects.toThrow(`Failed to load migration ${file}: file not found`);
    });

    it('should fail for a file without order prefix', async () => {
      const file = join(INVALID_DIR, 'no_order_prefix.mjs');

      await expect(loadMigration(file)).rejects.toThrow(
        `Failed to load migration ${file}: file name must look like <order>_<description>.<ext>`
      );
    });

    it('should refuse order 0 before importing anything', async () => {
      const file = join(MIGRATIONS_DIR, '0000_init.js');
      const importer = vi.fn<ModuleImporter>(async () => ({}));

      await expect(loadMigration(file, { importer })).rejects.toThrow(
        `Failed to load migration ${file}: order prefix "0000" is not a positive integer`
      );
      expect(importer).not.toHaveBeenCalled();
    });

    it('should refuse an order beyond the safe integer range', async () => {
      const file = join(MIGRATIONS_DIR, '9007199254740993_huge.js');

      await expect(loadMigration(file)).rejects.toThrow(
        `Failed to load migration ${file}: order prefix "9007199254740993" is not a positive integer`
      );
    });

    it('should fail when no export implements the interface', async () => {
      await expect(loadMigration(join(INVALID_DIR, '0001_no_migration_export.mjs'))).rejects.toThrow(
        'no migration export found'
      );
      await expect(loadMigration(join(INVALID_DIR, '0001_missing_down.mjs'))).rejects.toThrow(LoadError);
    });

    it('should wrap errors thrown while importing', async () => {
      const error = await loadMigration(join(INVALID_DIR, '0001_throws_on_import.mjs')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LoadError);
      expect(error).toHaveProperty('message', expect.stringContaining('import failed: settings not configured'));
    });

    it('should accept a CommonJS module.exports holding the class', async () => {
      class Migration {
        async up(): Promise<void> {}
        async down(): Promise<void> {}
      }
      const importer: ModuleImporter = async () => ({ default: { Migration } });

      const unit = await loadMigration(join(MIGRATIONS_DIR, '0001_create_users_index.js'), { importer });

      expect(unit.migration).toBeInstanceOf(Migration);
    });

    it('should report a constructor that throws', async () => {
      class Migration {
        constructor() {
          throw new Error('no settings');
        }
      }
      const importer: ModuleImporter = async () => ({ Migration });

      await expect(
        loadMigration(join(MIGRATIONS_DIR, '0001_create_users_index.js'), { importer })
      ).rejects.toThrow('constructor threw: no settings');
    });
  });

  describe('loadMigrationSet', () => {
    it('should load every migration of a directory in order', async () => {
      const registry = await loadMigrationSet(MIGRATIONS_DIR);

      expect(registry.getAll().map(u => u.name)).toEqual([
        '0001_create_users_index',
        '0002_add_posts_text_index',
        '0003_backfill_status'
      ]);
    });

    it('should refuse duplicate orders before importing anything', async () => {
      await expect(loadMigrationSet(INVALID_DIR, { extensions: ['.mjs'] })).rejects.toThrow(
        'Duplicate migration order 1'
      );
    });
  });
});
