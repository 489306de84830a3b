import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { splitModuleArgs } from '../context.js';
import { renderStatusTable } from '../commands/status.js';
import { createMigrateOneCommand } from '../commands/migrate-one.js';
import { createRollbackCommand } from '../commands/rollback.js';
import { createMigrateCommand } from '../commands/migrate.js';
import { createProgram } from '../program.js';
import { TempWorkspace } from '../../../tests/helpers/temp-workspace.js';

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

describe('CLI commands', () => {
  describe('splitModuleArgs', () => {
    it('should treat a single argument as the migration', () => {
      expect(splitModuleArgs('0001_init')).toEqual({ moduleName: undefined, migrationName: '0001_init' });
    });

    it('should treat two arguments as module and migration', () => {
      expect(splitModuleArgs('backend', '0001_init')).toEqual({ moduleName: 'backend', migrationName: '0001_init' });
    });
  });

  describe('command definitions', () => {
    it('should name the commands after the migrator verbs', () => {
      expect(createMigrateCommand().name()).toBe('migrate');
      expect(createMigrateOneCommand().name()).toBe('migrate-one');
      expect(createRollbackCommand().name()).toBe('rollback');
    });

    it('should show the optional module in the usage', () => {
      expect(createMigrateOneCommand().usage()).toBe('[options] [module] <migration>');
      expect(createRollbackCommand().usage()).toBe('[options] [module] <migration>');
    });
  });

  describe('renderStatusTable', () => {
    it('should render one row per migration', () => {
      const output = renderStatusTable([
        { name: '0001_a', order: 1, state: 'applied', appliedAt: new Date('2024-01-01T00:00:00.000Z') },
        { name: '0002_b', order: 2, state: 'pending' }
      ]).replace(ANSI_PATTERN, '');

      const lines = output.split('\n');
      expect(lines.some(line => /^│ 1\s+│ 0001_a\s+│ applied\s+│ 2024-01-01T00:00:00\.000Z\s+│$/.test(line))).toBe(true);
      expect(lines.some(line => /^│ 2\s+│ 0002_b\s+│ pending\s+│ -\s+│$/.test(line))).toBe(true);
    });
  });

  describe('failing commands', () => {
    let workspace: TempWorkspace;

    beforeEach(() => {
      workspace = new TempWorkspace('migrator-cli-');
    });

    afterEach(() => {
      workspace.cleanup();
    });

    it.each([
      { command: 'migrate', args: ['migrate', 'backend'], message: 'Failed to apply migrations of backend:' },
      { command: 'migrate-one', args: ['migrate-one', 'backend', '0001_a'], message: 'Failed to apply migration 0001_a:' },
      { command: 'rollback', args: ['rollback', 'backend', '0001_a'], message: 'Failed to roll back migration 0001_a:' }
    ])('should log the error and exit with status 1 when $command fails', async ({ args, message }) => {
      const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`process.exit(${code})`);
      });
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      const configFile = workspace.resolve('missing.json');

      await expect(
        createProgram().parseAsync(['node', 'migrator', '--config', configFile, ...args])
      ).rejects.toThrow('process.exit(1)');

      expect(exit).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledWith(1);
      expect(consoleError).toHaveBeenCalledWith(expect.stringContaining(message));
      expect(consoleError).toHaveBeenCalledWith(expect.stringContaining(`Config file not found at ${configFile}`));
    });
  });
});
