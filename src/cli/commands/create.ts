import { Command } from 'commander';
import { resolveLayoutSettings, failCommand, getGlobalOptions, splitModuleArgs } from '../context.js';
import { createMigrationFile } from '../../migrations/scaffold.js';
import { resolveMigrationsDir } from '../../utils/paths.js';
import { createLogger } from '../../utils/logger.js';

export function createCreateCommand(): Command {
  const command = new Command('create');

  command
    .description('Create the next migration file')
    .usage('[options] [module] <description>')
    .argument('<module-or-description>', 'Module containing the migrations directory, or the description when no module is given')
    .argument('[description]', 'What the migration does (e.g. "add text index")')
    .action(async (first: string, second: string | undefined, _options: unknown, cmd: Command) => {
      const globals = getGlobalOptions(cmd);
      const { moduleName, migrationName: description } = splitModuleArgs(first, second);
      try {
        const settings = await resolveLayoutSettings(globals);
        const logger = createLogger({ debug: settings.debug });
        const dir = resolveMigrationsDir(moduleName, process.cwd(), settings.migrationsDir);
        const file = await createMigrationFile(dir, description, settings.extensions);
        logger.success(`Created ${file}`);
      } catch (error: unknown) {
        failCommand('Failed to create migration:', error, globals);
      }
    });

  return command;
}
