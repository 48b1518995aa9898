import { Command } from 'commander';
import chalk from 'chalk';
import { SETTING_KEYS, getSetting, isSettingKey, loadSettings, setSetting } from '@tododesk/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { ContextProvider } from '../context.js';

function printSetting(key: string, value: unknown): void {
  console.log(`${chalk.bold(key)} = ${String(value)}`);
}

export function createConfigCommand(getContext: ContextProvider): Command {
  const configCommand = new Command('config')
    .description('Show or change settings');

  configCommand.addCommand(
    new Command('get')
      .description('Show one setting, or all of them')
      .argument('[key]', `One of: ${SETTING_KEYS.join(', ')}`)
      .action((key: string | undefined, _opts: unknown, cmd: Command) => $try(() => {
        const { paths } = getContext(cmd);
        if (key === undefined) {
          const settings = loadSettings(paths.settingsFile);
          for (const k of SETTING_KEYS) printSetting(k, settings[k]);
          return;
        }
        if (!isSettingKey(key)) {
          out.error(`Unknown setting '${key}'. Use one of: ${SETTING_KEYS.join(', ')}`);
          return;
        }
        printSetting(key, getSetting(paths.settingsFile, key));
      })),
  );

  configCommand.addCommand(
    new Command('set')
      .description('Change a setting')
      .argument('<key>', `One of: ${SETTING_KEYS.join(', ')}`)
      .argument('<value>', 'New value')
      .action((key: string, value: string, _opts: unknown, cmd: Command) => $try(() => {
        if (!isSettingKey(key)) {
          out.error(`Unknown setting '${key}'. Use one of: ${SETTING_KEYS.join(', ')}`);
          return;
        }
        const { paths } = getContext(cmd);
        const settings = setSetting(paths.settingsFile, key, value);
        out.success(`Set ${key} = ${String(settings[key])}`);
      })),
  );

  return configCommand;
}
