/**
 * File locations and user settings. Settings live in a JSON file next to
 * the task file; unknown or invalid values fall back to their defaults.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { Category, DEFAULT_CATEGORY, parseCategory } from './types/category.js';
import { ValidationError, errorMessage } from './errors.js';
import { createLogger, isLogLevel, LOG_LEVEL_NAMES, setLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';
import { URGENCY_WINDOW_DAYS } from './model/task-model.js';

const log = createLogger('config');

const APP_DIR = 'tododesk';
export const TASKS_FILE = 'tasks.json';
export const SETTINGS_FILE = 'settings.json';
export const BACKUP_DIR = 'backups';

export interface DataPaths {
  dataDir: string;
  tasksFile: string;
  settingsFile: string;
  backupDir: string;
}

type Env = Record<string, string | undefined>;

/** Returns the platform-appropriate data directory */
export function getDefaultDataDir(platform: NodeJS.Platform = process.platform, env: Env = process.env): string {
  const override = env['TODODESK_DATA_DIR'];
  if (override) return override;

  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', APP_DIR);
  }
  if (platform === 'win32') {
    return join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  }
  // Linux / other
  return join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR);
}

/**
 * Resolve every file the app touches. An explicit task file moves the
 * settings and backups next to it.
 */
export function resolveDataPaths(tasksFile?: string, env: Env = process.env): DataPaths {
  const dataDir = tasksFile ? dirname(tasksFile) : getDefaultDataDir(process.platform, env);
  return {
    dataDir,
    tasksFile: tasksFile ?? join(dataDir, TASKS_FILE),
    settingsFile: join(dataDir, SETTINGS_FILE),
    backupDir: join(dataDir, BACKUP_DIR),
  };
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const SettingsSchema = z.object({
  defaultCategory: z.nativeEnum(Category).default(DEFAULT_CATEGORY).catch(DEFAULT_CATEGORY),
  urgencyWindowDays: z.number().int().min(0).max(365).default(URGENCY_WINDOW_DAYS).catch(URGENCY_WINDOW_DAYS),
  logLevel: LogLevelSchema.default('warn').catch('warn'),
  backups: z.boolean().default(true).catch(true),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingKey = keyof Settings;

export const SETTING_KEYS: readonly SettingKey[] = ['defaultCategory', 'urgencyWindowDays', 'logLevel', 'backups'];

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some(k => k === key);
}

/** Read settings from disk. Missing or unreadable files yield the defaults. */
export function loadSettings(filePath: string): Settings {
  if (!existsSync(filePath)) return { ...DEFAULT_SETTINGS };

  try {
    const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
    const parsed = SettingsSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
    log.warn(`ignoring ${filePath}: expected a JSON object`);
  } catch (err) {
    log.warn(`ignoring ${filePath}:`, errorMessage(err));
  }
  return { ...DEFAULT_SETTINGS };
}

export function saveSettings(filePath: string, settings: Settings): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(settings, null, 2) + '\n', 'utf8');
}

/** Parse a raw (command-line) value for a setting. Throws ValidationError. */
export function parseSettingValue<K extends SettingKey>(key: K, raw: string): Settings[K];
export function parseSettingValue(key: SettingKey, raw: string): Settings[SettingKey] {
  const value = raw.trim();
  switch (key) {
    case 'defaultCategory': {
      const category = parseCategory(value);
      if (!category) throw new ValidationError([`Unknown category '${raw}'`]);
      return category;
    }
    case 'urgencyWindowDays': {
      const days = Number(value);
      if (!Number.isInteger(days) || days < 0 || days > 365) {
        throw new ValidationError([`urgencyWindowDays must be a whole number between 0 and 365, got '${raw}'`]);
      }
      return days;
    }
    case 'logLevel':
      if (!isLogLevel(value)) {
        throw new ValidationError([`logLevel must be one of: ${LOG_LEVEL_NAMES.join(', ')}`]);
      }
      return value;
    case 'backups':
      if (value === 'true' || value === 'on') return true;
      if (value === 'false' || value === 'off') return false;
      throw new ValidationError([`backups must be true or false, got '${raw}'`]);
  }
}

export function getSetting<K extends SettingKey>(filePath: string, key: K): Settings[K] {
  return loadSettings(filePath)[key];
}

/** Update one setting on disk and return the new settings */
export function setSetting<K extends SettingKey>(filePath: string, key: K, raw: string): Settings {
  const settings = loadSettings(filePath);
  settings[key] = parseSettingValue(key, raw);
  saveSettings(filePath, settings);
  return settings;
}

/** Apply the effective log level: TODODESK_LOG_LEVEL wins over the settings file */
export function applyLogLevel(settings: Settings, env: Env = process.env): LogLevel {
  const fromEnv = env['TODODESK_LOG_LEVEL'];
  const level = fromEnv && isLogLevel(fromEnv) ? fromEnv : settings.logLevel;
  setLogLevel(level);
  return level;
}
