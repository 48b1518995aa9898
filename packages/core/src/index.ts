// Types
export * from './types/index.js';

// Errors
export { TodoError, ValidationError, PersistenceReadError, PersistenceWriteError, errorMessage } from './errors.js';
export type { TodoErrorCode } from './errors.js';

// Logging
export { createLogger, setLogLevel, getLogLevel, isLogLevel, LOG_LEVEL_NAMES } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

// Config
export {
  getDefaultDataDir,
  resolveDataPaths,
  loadSettings,
  saveSettings,
  getSetting,
  setSetting,
  parseSettingValue,
  applyLogLevel,
  isSettingKey,
  SETTING_KEYS,
  DEFAULT_SETTINGS,
  TASKS_FILE,
  SETTINGS_FILE,
  BACKUP_DIR,
} from './config.js';
export type { DataPaths, Settings, SettingKey } from './config.js';

// Parsers
export * from './parsers/index.js';

// Model
export * from './model/index.js';

// Store
export * from './store/index.js';

// Backup
export { BackupManager } from './backup/index.js';
export type { BackupInfo, BackupManagerOptions } from './backup/index.js';
