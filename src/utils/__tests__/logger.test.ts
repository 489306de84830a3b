import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { createLogger } from '../logger.js';
import { TempWorkspace } from '../../../tests/helpers/temp-workspace.js';

describe('Logger', () => {
  let workspace: TempWorkspace;
  let originalDebugEnv: string | undefined;

  beforeEach(() => {
    workspace = new TempWorkspace('migrator-logger-');
    originalDebugEnv = process.env.MIGRATOR_DEBUG;
    delete process.env.MIGRATOR_DEBUG;
  });

  afterEach(() => {
    if (originalDebugEnv === undefined) {
      delete process.env.MIGRATOR_DEBUG;
    } else {
      process.env.MIGRATOR_DEBUG = originalDebugEnv;
    }
    workspace.cleanup();
  });

  it('should read debug mode from MIGRATOR_DEBUG', () => {
    expect(createLogger().isDebugEnabled()).toBe(false);

    process.env.MIGRATOR_DEBUG = 'true';
    expect(createLogger().isDebugEnabled()).toBe(true);
  });

  it('should prefer the explicit option over the environment', () => {
    process.env.MIGRATOR_DEBUG = '1';

    expect(createLogger({ debug: false }).isDebugEnabled()).toBe(false);
  });

  it('should not print debug lines unless enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger({ debug: false }).debug('hidden');
    expect(log).not.toHaveBeenCalled();

    createLogger({ debug: true }).debug('shown');
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('should print nothing when silent', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger({ silent: true, debug: true });

    logger.info('info');
    logger.success('done');
    logger.debug('debug');
    logger.error('failed', new Error('boom'));

    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });

  it('should append timestamped lines to the log file in debug mode', async () => {
    const logFile = join(workspace.path, 'logs', 'migrator.log');
    const logger = createLogger({ debug: true, silent: true, logFile });

    logger.info('Applying migration 0001_a...');
    logger.error('Migration failed', 'duplicate key');
    await logger.flush();

    const lines = (await fs.readFile(logFile, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] Applying migration 0001_a\.\.\.$/);
    expect(lines[1]).toMatch(/\[ERROR\] ✗ Migration failed$/);
    expect(lines[2]).toMatch(/\[ERROR\] duplicate key$/);
  });

  it('should not write the log file outside debug mode', async () => {
    const logFile = join(workspace.path, 'migrator.log');
    const logger = createLogger({ debug: false, silent: true, logFile });

    logger.info('quiet');
    await logger.flush();

    await expect(fs.access(logFile)).rejects.toThrow();
  });
});
