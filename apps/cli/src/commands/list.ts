import { Command } from 'commander';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { ContextProvider } from '../context.js';

export function createListCommand(getContext: ContextProvider): Command {
  return new Command('list')
    .alias('ls')
    .description('List tasks, optionally only those containing some text')
    .argument('[filter...]', 'Text to look for in title, description or category')
    .option('-s, --search', 'Also read category:, status: and id: filters (prefix with ! to exclude)')
    .action((filter: string[], opts: { search?: boolean }, cmd: Command) => $try(() => {
      const { store, now } = getContext(cmd);

      if (store.count === 0) {
        out.info('No tasks saved yet... use the add command to create one');
        return;
      }

      const text = filter.join(' ');
      const matches = opts.search ? store.search(text) : store.query(text);
      if (matches.length === 0) {
        out.info(`No tasks match '${text}'`);
        return;
      }

      const today = now();
      for (const match of matches) {
        console.log(out.formatTaskLine(match, store.urgencyOf(match.task), today));
      }
      console.log();
      out.info(out.formatProgress(store.progressSummary()));
    }));
}
