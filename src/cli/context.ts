import type { Command } from 'commander';
import ora from 'ora';
import { loadLayoutSettings, loadSettings } from '../env/settings.js';
import type { LayoutSettings, MigratorSettings, SettingsInput } from '../env/types.js';
import { connectDatabase } from '../db/connection.js';
import { MigrationLedger, MongoLedgerStore } from '../migrations/ledger.js';
import { MigrationManager } from '../migrations/manager.js';
import { MigrationRunner } from '../migrations/runner.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';

/**
 * Options accepted by every command
 */
export type GlobalOptions = {
  uri?: string;
  db?: string;
  collection?: string;
  config?: string;
  debug?: boolean;
};

export interface MigrationContext {
  settings: MigratorSettings;
  logger: Logger;
  runner: MigrationRunner;
}

export function getGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Split `[module] <migration>` arguments; a single argument is the migration
 */
export function splitModuleArgs(
  first: string,
  second?: string
): { moduleName: string | undefined; migrationName: string } {
  if (second === undefined) {
    return { moduleName: undefined, migrationName: first };
  }
  return { moduleName: first, migrationName: second };
}

function toOverrides(options: GlobalOptions): SettingsInput {
  return {
    mongodbUri: options.uri,
    databaseName: options.db,
    collection: options.collection,
    debug: options.debug ? true : undefined
  };
}

export async function resolveSettings(options: GlobalOptions): Promise<MigratorSettings> {
  return loadSettings(toOverrides(options), { configFile: options.config });
}

export async function resolveLayoutSettings(options: GlobalOptions): Promise<LayoutSettings> {
  return loadLayoutSettings(toOverrides(options), { configFile: options.config });
}

/**
 * Connect, build the runner, run the action and always close the connection
 */
export async function withMigrationContext<T>(
  options: GlobalOptions,
  action: (context: MigrationContext) => Promise<T>
): Promise<T> {
  const settings = await resolveSettings(options);
  const logger = createLogger({ debug: settings.debug, logFile: settings.logFile });

  try {
    return await runConnected(settings, logger, action);
  } catch (error: unknown) {
    // failCommand has no log file; keep the failure in the debug log
    logger.debug(`[MigrationContext] Command failed: ${getErrorMessage(error)}`);
    throw error;
  } finally {
    await logger.flush();
  }
}

async function runConnected<T>(
  settings: MigratorSettings,
  logger: Logger,
  action: (context: MigrationContext) => Promise<T>
): Promise<T> {
  const spinner = ora(`Connecting to database ${settings.databaseName}...`).start();
  const connection = await connectDatabase(settings, logger).catch((error: unknown) => {
    spinner.fail(`Could not connect to database: ${getErrorMessage(error)}`);
    throw error;
  });
  spinner.succeed(`Connected to database ${settings.databaseName}`);

  const ledger = new MigrationLedger(MongoLedgerStore.fromDb(connection.db, settings.collection), logger);
  const manager = new MigrationManager({ db: connection.db, ledger, logger });
  const runner = new MigrationRunner({
    manager,
    logger,
    migrationsDir: settings.migrationsDir,
    extensions: settings.extensions
  });

  try {
    return await action({ settings, logger, runner });
  } finally {
    await connection.close();
  }
}

/**
 * Log a failed command and exit non-zero
 */
export function failCommand(message: string, error: unknown, options: GlobalOptions): never {
  const logger = createLogger({ debug: options.debug });
  logger.error(message, error);
  process.exit(1);
}
