import { Command } from 'commander';
import type { TaskFields } from '@tododesk/core';
import * as out from '../output.js';
import { $try, parseTaskId, resolveDeadlineArg } from '../helpers.js';
import type { ContextProvider } from '../context.js';

interface EditOptions {
  title?: string;
  description?: string;
  deadline?: string;
  category?: string;
}

export function createEditCommand(getContext: ContextProvider): Command {
  return new Command('edit')
    .description('Change the title, description, deadline or category of a task')
    .argument('<taskId>', 'The id of the task to edit')
    .option('-t, --title <text>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('-D, --deadline <date>', 'New deadline')
    .option('-c, --category <name>', 'New category')
    .action((taskId: string, opts: EditOptions, cmd: Command) => $try(() => {
      const id = parseTaskId(taskId);
      const { store, now } = getContext(cmd);

      const changes: Partial<TaskFields> = {};
      if (opts.title !== undefined) changes.title = opts.title;
      if (opts.description !== undefined) changes.description = opts.description;
      if (opts.deadline !== undefined) changes.deadline = resolveDeadlineArg(opts.deadline, now());
      if (opts.category !== undefined) changes.category = opts.category;

      if (Object.keys(changes).length === 0) {
        out.warning('Nothing to change. Pass --title, --description, --deadline or --category');
        return;
      }

      out.printResult(store.editById(id, changes));
    }));
}
