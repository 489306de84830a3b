import { Command } from 'commander';
import { failCommand, getGlobalOptions, splitModuleArgs, withMigrationContext } from '../context.js';

export function createMigrateOneCommand(): Command {
  const command = new Command('migrate-one');

  command
    .description('Apply one specific migration')
    .usage('[options] [module] <migration>')
    .argument('<module-or-migration>', 'Module containing the migrations directory, or the migration when no module is given')
    .argument('[migration]', 'Migration to apply (e.g. 0002_add_index)')
    .action(async (first: string, second: string | undefined, _options: unknown, cmd: Command) => {
      const globals = getGlobalOptions(cmd);
      const { moduleName, migrationName } = splitModuleArgs(first, second);
      try {
        await withMigrationContext(globals, ({ runner }) => runner.migrateOne(moduleName, migrationName));
      } catch (error: unknown) {
        failCommand(`Failed to apply migration ${migrationName}:`, error, globals);
      }
    });

  return command;
}
