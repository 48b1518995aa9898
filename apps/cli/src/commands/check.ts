import { Command } from 'commander';
import * as out from '../output.js';
import { $try, parseTaskIds } from '../helpers.js';
import type { ContextProvider } from '../context.js';

export function createCheckCommand(getContext: ContextProvider): Command {
  return new Command('check')
    .description('Toggle one or more tasks between done and pending')
    .argument('<taskIds...>', 'The id(s) of the task(s) to toggle')
    .action((taskIds: string[], _opts: unknown, cmd: Command) => $try(() => {
      const ids = parseTaskIds(taskIds);
      const { store } = getContext(cmd);
      out.printResults(ids.map(id => store.toggleById(id)));
    }));
}
