/**
 * Migration context tests
 *
 * The database connection is replaced so a failed connect can be observed
 * without a server.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { withMigrationContext } from '../context.js';
import { TempWorkspace } from '../../../tests/helpers/temp-workspace.js';

vi.mock('../../db/connection.js', () => ({
  connectDatabase: vi.fn(async () => {
    throw new Error('connect ECONNREFUSED 127.0.0.1:27017');
  })
}));

describe('withMigrationContext', () => {
  let workspace: TempWorkspace;

  beforeEach(() => {
    workspace = new TempWorkspace('migrator-context-');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    workspace.cleanup();
  });

  it('should write the failure to the debug log file before rethrowing', async () => {
    const logFile = workspace.resolve('logs/migrator.log');
    const configFile = workspace.writeJSON('migrator.config.json', { logFile });
    const action = vi.fn(async () => 'unreachable');

    await expect(
      withMigrationContext(
        { uri: 'mongodb://localhost:27017', db: 'app_test', debug: true, config: configFile },
        action
      )
    ).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:27017');

    expect(action).not.toHaveBeenCalled();
    const lines = (await fs.readFile(logFile, 'utf-8')).trim().split('\n');
    expect(lines.at(-1)).toMatch(
      /^\[[^\]]+\] \[DEBUG\] \[MigrationContext\] Command failed: connect ECONNREFUSED 127\.0\.0\.1:27017$/
    );
  });
});
