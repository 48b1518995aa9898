import { resolve } from 'node:path';
import type { Command } from 'commander';
import {
  BackupManager, TaskStore, applyLogLevel, loadSettings, resolveDataPaths,
} from '@tododesk/core';
import type { DataPaths, Settings } from '@tododesk/core';
import * as out from './output.js';

/** Everything a command needs, resolved from the global options */
export interface CliContext {
  paths: DataPaths;
  settings: Settings;
  store: TaskStore;
  backup: BackupManager;
  now: () => Date;
}

export type ContextProvider = (cmd: Command) => CliContext;

export interface ContextOptions {
  env?: Record<string, string | undefined>;
  now?: () => Date;
}

export function openContext(file: string | undefined, options: ContextOptions = {}): CliContext {
  const env = options.env ?? process.env;
  const now = options.now ?? (() => new Date());
  const paths = resolveDataPaths(file ? resolve(file) : undefined, env);
  const settings = loadSettings(paths.settingsFile);
  applyLogLevel(settings, env);

  const backup = new BackupManager(paths.backupDir, paths.tasksFile, { now });
  const store = TaskStore.open(paths.tasksFile, {
    now,
    defaultCategory: settings.defaultCategory,
    urgencyWindowDays: settings.urgencyWindowDays,
    backup: settings.backups ? backup : null,
  });

  if (store.loadError) {
    out.warning(`${store.loadError.message}. Starting with an empty list`);
  }

  return { paths, settings, store, backup, now };
}

/**
 * Lazily open the context once per run, using `--file` from the root
 * program's options.
 */
export function contextProvider(options: ContextOptions = {}): ContextProvider {
  let ctx: CliContext | null = null;
  return (cmd) => {
    ctx ??= openContext(cmd.optsWithGlobals<{ file?: string }>().file, options);
    return ctx;
  };
}
