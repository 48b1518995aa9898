import { Command } from 'commander';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { ContextProvider } from '../context.js';

export function createProgressCommand(getContext: ContextProvider): Command {
  return new Command('progress')
    .description('Show how many tasks are done')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const summary = getContext(cmd).store.progressSummary();
      if (summary.total === 0) {
        out.info('No tasks yet');
        return;
      }
      console.log(`${out.formatProgressBar(summary.percent)} ${summary.percent}%`);
      out.info(out.formatProgress(summary));
    }));
}
