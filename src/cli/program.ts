import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { createMigrateCommand } from './commands/migrate.js';
import { createMigrateOneCommand } from './commands/migrate-one.js';
import { createRollbackCommand } from './commands/rollback.js';
import { createStatusCommand } from './commands/status.js';
import { createCreateCommand } from './commands/create.js';
import { getDirname } from '../utils/paths.js';

/**
 * package.json sits two levels up from src/cli and three from dist/src/cli
 */
function readVersion(): string {
  const here = getDirname(import.meta.url);
  for (const candidate of [join(here, '../../package.json'), join(here, '../../../package.json')]) {
    try {
      const packageJson = JSON.parse(readFileSync(candidate, 'utf-8')) as { name?: string; version?: string };
      if (packageJson.name === 'mongo-ledger-migrate' && packageJson.version) {
        return packageJson.version;
      }
    } catch {
      // try the next location
    }
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('migrator')
    .description('Apply and roll back MongoDB migrations in order')
    .version(readVersion())
    .option('--uri <uri>', 'MongoDB connection string (default: $MONGODB_URI)')
    .option('--db <name>', 'Database name (default: $MONGO_DATABASE_NAME)')
    .option('--collection <name>', 'Ledger collection (default: migrations)')
    .option('-c, --config <file>', 'Config file (default: ./migrator.config.json)')
    .option('--debug', 'Enable debug logging');

  program.addCommand(createMigrateCommand());
  program.addCommand(createMigrateOneCommand());
  program.addCommand(createRollbackCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createCreateCommand());

  return program;
}
