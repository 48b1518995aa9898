import { Command } from 'commander';
import { describeTask } from '@tododesk/core';
import * as out from '../output.js';
import { $try, parseTaskIds } from '../helpers.js';
import type { ContextProvider } from '../context.js';

export function createDeleteCommand(getContext: ContextProvider): Command {
  return new Command('delete')
    .description('Delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .option('-f, --force', 'Delete without asking')
    .action((taskIds: string[], opts: { force?: boolean }, cmd: Command) => $try(() => {
      const ids = parseTaskIds(taskIds);
      const { store } = getContext(cmd);

      if (!opts.force) {
        for (const id of ids) {
          const task = store.getById(id);
          if (task) out.info(`Would delete task ${id}: ${describeTask(task)}`);
          else out.error(`Could not find task with id ${id}`);
        }
        out.warning('Use --force to delete.');
        return;
      }

      out.printResults(ids.map(id => store.deleteById(id)));
    }));
}
