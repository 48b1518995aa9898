import { Command } from 'commander';
import chalk from 'chalk';
import * as out from '../output.js';
import { $try, formatTimestamp, parseBackupIndex } from '../helpers.js';
import type { ContextProvider } from '../context.js';

export function createBackupCommand(getContext: ContextProvider): Command {
  const backupCommand = new Command('backup')
    .description('Manage task file backups');

  backupCommand.addCommand(
    new Command('list')
      .description('List available backups')
      .action((_opts: unknown, cmd: Command) => $try(() => {
        const { backup, now } = getContext(cmd);
        const backups = backup.listBackups();
        if (backups.length === 0) {
          out.info('No backups available.');
          return;
        }

        console.log(`${chalk.bold('Available backups:')}\n`);
        const today = now();
        for (let i = 0; i < backups.length; i++) {
          const b = backups[i]!;
          const age = out.getTimeAgo(b.timestamp, today);
          const type = b.isDaily ? ` ${chalk.dim('(daily)')}` : '';
          console.log(`  ${String(i + 1).padStart(2)}. ${age.padEnd(14)} (${formatTimestamp(b.timestamp)})${type}`);
        }
      })),
  );

  backupCommand.addCommand(
    new Command('restore')
      .description('Restore the task file from a backup')
      .argument('[index]', 'Backup number from "backup list" (1 = most recent)', '1')
      .option('--force', 'Skip confirmation prompt')
      .action((indexStr: string, opts: { force?: boolean }, cmd: Command) => $try(() => {
        const index = parseBackupIndex(indexStr);
        const { backup, store } = getContext(cmd);
        const backups = backup.listBackups();

        if (backups.length === 0) {
          out.error('No backups available. Backups are created automatically when you modify tasks.');
          return;
        }

        if (index < 1 || index > backups.length) {
          out.error(`Backup #${index} not found. Use 'backup list' to see available backups (1-${backups.length}).`);
          return;
        }

        const chosen = backups[index - 1]!;

        if (!opts.force) {
          out.warning(`This will restore from backup dated ${formatTimestamp(chosen.timestamp)}`);
          out.info('Current tasks will be backed up before restore.');
          out.info('Use --force to skip this confirmation.');
          return;
        }

        backup.restoreBackup(chosen.timestamp);
        store.reload();
        out.success(`Restored ${store.count} task(s) from backup dated ${formatTimestamp(chosen.timestamp)}`);
      })),
  );

  return backupCommand;
}
