import { Command } from 'commander';
import { contextProvider } from './context.js';
import type { ContextOptions } from './context.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createCheckCommand } from './commands/check.js';
import { createEditCommand } from './commands/edit.js';
import { createDeleteCommand } from './commands/delete.js';
import { createProgressCommand } from './commands/progress.js';
import { createBackupCommand } from './commands/backup.js';
import { createConfigCommand } from './commands/config.js';

export const VERSION = '1.0.0';

/** Build the CLI program. The task file is opened on first use by a command. */
export function createProgram(options: ContextOptions = {}): Command {
  const getContext = contextProvider(options);

  const program = new Command()
    .name('tododesk')
    .description('Personal task tracker with deadlines and categories')
    .version(VERSION)
    .option('--file <path>', 'Task file to use instead of the default data directory');

  program.addCommand(createAddCommand(getContext));
  program.addCommand(createListCommand(getContext));
  program.addCommand(createCheckCommand(getContext));
  program.addCommand(createEditCommand(getContext));
  program.addCommand(createDeleteCommand(getContext));
  program.addCommand(createProgressCommand(getContext));
  program.addCommand(createBackupCommand(getContext));
  program.addCommand(createConfigCommand(getContext));

  return program;
}
