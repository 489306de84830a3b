import { Command } from 'commander';
import { failCommand, getGlobalOptions, withMigrationContext } from '../context.js';

export function createMigrateCommand(): Command {
  const command = new Command('migrate');

  command
    .description('Apply all pending migrations of a module')
    .argument('<module>', 'Module containing the migrations directory (dots or slashes)')
    .action(async (moduleName: string, _options: unknown, cmd: Command) => {
      const globals = getGlobalOptions(cmd);
      try {
        await withMigrationContext(globals, ({ runner }) => runner.migrateAll(moduleName));
      } catch (error: unknown) {
        failCommand(`Failed to apply migrations of ${moduleName}:`, error, globals);
      }
    });

  return command;
}
