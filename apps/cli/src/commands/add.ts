import { Command } from 'commander';
import * as out from '../output.js';
import { $try, resolveDeadlineArg } from '../helpers.js';
import type { ContextProvider } from '../context.js';

interface AddOptions {
  deadline: string;
  description: string;
  category?: string;
}

export function createAddCommand(getContext: ContextProvider): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .requiredOption('-D, --deadline <date>', 'Deadline: DD-MM-YYYY, today, tomorrow, +3d, friday, jan15')
    .option('-d, --description <text>', 'Longer description', '')
    .option('-c, --category <name>', 'General, School, Work or Personal')
    .action((title: string, opts: AddOptions, cmd: Command) => $try(() => {
      const { store, now } = getContext(cmd);

      const { task, persistError } = store.add({
        title,
        description: opts.description,
        deadline: resolveDeadlineArg(opts.deadline, now()),
        category: opts.category,
      });

      out.success(`Added task ${task.id}: ${task.title} (due ${task.deadline})`);
      if (persistError) out.warning(persistError.message);
    }));
}
