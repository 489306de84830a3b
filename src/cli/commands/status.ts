import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import type { MigrationStatus } from '../../migrations/types.js';
import { failCommand, getGlobalOptions, withMigrationContext } from '../context.js';

const STATE_LABELS: Record<MigrationStatus['state'], string> = {
  applied: chalk.green('applied'),
  pending: chalk.yellow('pending'),
  orphaned: chalk.red('orphaned')
};

export function renderStatusTable(statuses: MigrationStatus[]): string {
  const table = new Table({
    head: [chalk.cyan('Order'), chalk.cyan('Migration'), chalk.cyan('State'), chalk.cyan('Applied at')],
    style: {
      head: [],
      border: ['grey']
    }
  });

  for (const status of statuses) {
    table.push([
      chalk.white(String(status.order)),
      chalk.white(status.name),
      STATE_LABELS[status.state],
      chalk.dim(status.appliedAt ? status.appliedAt.toISOString() : '-')
    ]);
  }

  return table.toString();
}

export function createStatusCommand(): Command {
  const command = new Command('status');

  command
    .description('Show applied, pending and orphaned migrations')
    .argument('[module]', 'Module containing the migrations directory')
    .action(async (moduleName: string | undefined, _options: unknown, cmd: Command) => {
      const globals = getGlobalOptions(cmd);
      try {
        const statuses = await withMigrationContext(globals, ({ runner }) => runner.status(moduleName));
        console.log(chalk.bold.white('\n📋 Migration Status\n'));
        if (statuses.length === 0) {
          console.log(chalk.dim('No migrations found\n'));
          return;
        }
        console.log(renderStatusTable(statuses));

        const pending = statuses.filter(s => s.state === 'pending').length;
        console.log(chalk.dim(`\n→ ${pending} pending migration(s)\n`));
      } catch (error: unknown) {
        failCommand('Failed to read migration status:', error, globals);
      }
    });

  return command;
}
