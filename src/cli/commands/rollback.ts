import { Command } from 'commander';
import { failCommand, getGlobalOptions, splitModuleArgs, withMigrationContext } from '../context.js';

export function createRollbackCommand(): Command {
  const command = new Command('rollback');

  command
    .description('Roll back one specific migration')
    .usage('[options] [module] <migration>')
    .argument('<module-or-migration>', 'Module containing the migrations directory, or the migration when no module is given')
    .argument('[migration]', 'Migration to roll back (e.g. 0002_add_index)')
    .action(async (first: string, second: string | undefined, _options: unknown, cmd: Command) => {
      const globals = getGlobalOptions(cmd);
      const { moduleName, migrationName } = splitModuleArgs(first, second);
      try {
        await withMigrationContext(globals, ({ runner }) => runner.rollback(moduleName, migrationName));
      } catch (error: unknown) {
        failCommand(`Failed to roll back migration ${migrationName}:`, error, globals);
      }
    });

  return command;
}
