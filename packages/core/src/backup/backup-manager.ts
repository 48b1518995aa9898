/**
 * Manages automatic backup creation, rotation, and restoration of the
 * task file. Backups are plain copies of the JSON file, named after it
 * (`work.json` → `work.<timestamp>.backup.json`) so several task files
 * can share one backup directory.
 */

import { copyFileSync, existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from 'node:fs';
import { join, basename, extname } from 'node:path';
import { createLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { formatDate } from '../parsers/date-parser.js';
import { fileTimestamp } from '../store/task-file.js';

const log = createLogger('backup');

const MAX_VERSION_BACKUPS = 10;
const MAX_DAILY_BACKUP_DAYS = 7;
const BACKUP_EXT = '.backup.json';
const DAILY_PREFIX = 'daily.';
const PRE_RESTORE_PREFIX = 'pre-restore.';
// Matched against the part between `<name>.` and `.backup.json`
const TS_FORMAT_RE = /^(\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2})$/;
const DAILY_FORMAT_RE = /^daily\.(\d{4}-\d{2}-\d{2})$/;

export interface BackupInfo {
  filePath: string;
  timestamp: Date;
  isDaily: boolean;
  fileSize: number;
}

export interface BackupManagerOptions {
  now?: () => Date;
}

export class BackupManager {
  private backupDir: string;
  private tasksFile: string;
  private prefix: string;
  private now: () => Date;

  constructor(backupDir: string, tasksFile: string, options: BackupManagerOptions = {}) {
    this.backupDir = backupDir;
    this.tasksFile = tasksFile;
    this.prefix = `${basename(tasksFile, extname(tasksFile))}.`;
    this.now = options.now ?? (() => new Date());
  }

  /** Copy the task file before it is modified. Failures are logged, not thrown. */
  createBackup(): void {
    if (!existsSync(this.tasksFile)) return;
    try {
      this.ensureDir();
      const now = this.now();
      copyFileSync(this.tasksFile, this.versionPath(now));
      this.createDailyIfNeeded(now);
      this.rotate(now);
    } catch (err) {
      log.warn('backup failed:', errorMessage(err));
    }
  }

  /** List this task file's backups, newest first */
  listBackups(): BackupInfo[] {
    if (!existsSync(this.backupDir)) return [];

    const backups: BackupInfo[] = [];
    for (const name of readdirSync(this.backupDir)) {
      if (!name.startsWith(this.prefix) || !name.endsWith(BACKUP_EXT)) continue;
      const info = this.parseBackupFile(join(this.backupDir, name));
      if (info) backups.push(info);
    }

    return backups.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }

  /** Restore from a specific backup. Copies the current file aside first. */
  restoreBackup(timestamp: Date): void {
    const backupPath = this.findByTimestamp(timestamp);
    if (!backupPath) throw new Error(`Backup from ${timestamp.toISOString()} not found`);

    if (existsSync(this.tasksFile)) {
      this.ensureDir();
      copyFileSync(this.tasksFile, this.preRestorePath(this.now()));
    }

    copyFileSync(backupPath, this.tasksFile);
    log.info(`restored ${this.tasksFile} from ${basename(backupPath)}`);
  }

  private ensureDir(): void {
    if (!existsSync(this.backupDir)) {
      mkdirSync(this.backupDir, { recursive: true });
    }
  }

  private createDailyIfNeeded(now: Date): void {
    const path = this.dailyPath(now);
    if (existsSync(path)) return;
    copyFileSync(this.tasksFile, path);
  }

  private rotate(now: Date): void {
    this.rotateVersionBackups();
    this.rotateDailyBackups(now);
  }

  private rotateVersionBackups(): void {
    const versions = this.listBackups().filter(b => !b.isDaily);
    for (const backup of versions.slice(MAX_VERSION_BACKUPS)) {
      this.tryDelete(backup.filePath);
    }
  }

  private rotateDailyBackups(now: Date): void {
    const cutoff = new Date(now);
    cutoff.setDate(cutoff.getDate() - MAX_DAILY_BACKUP_DAYS);

    for (const backup of this.listBackups()) {
      if (backup.isDaily && backup.timestamp < cutoff) this.tryDelete(backup.filePath);
    }
  }

  private tryDelete(path: string): void {
    try {
      unlinkSync(path);
    } catch (err) {
      log.debug(`could not remove ${path}:`, errorMessage(err));
    }
  }

  private findByTimestamp(timestamp: Date): string | null {
    if (!existsSync(this.backupDir)) return null;

    const vPath = this.versionPath(timestamp);
    if (existsSync(vPath)) return vPath;

    const dPath = this.dailyPath(timestamp);
    if (existsSync(dPath)) return dPath;

    return null;
  }

  private parseBackupFile(filePath: string): BackupInfo | null {
    const name = basename(filePath);
    const stamp = name.slice(this.prefix.length, name.length - BACKUP_EXT.length);

    const vMatch = TS_FORMAT_RE.exec(stamp);
    if (vMatch) {
      const ts = vMatch[1]!.replace(/T(\d{2})-(\d{2})-(\d{2})$/, 'T$1:$2:$3');
      const d = new Date(ts);
      if (!isNaN(d.getTime())) {
        return { filePath, timestamp: d, isDaily: false, fileSize: statSync(filePath).size };
      }
    }

    const dMatch = DAILY_FORMAT_RE.exec(stamp);
    if (dMatch) {
      const d = new Date(dMatch[1]! + 'T00:00:00');
      if (!isNaN(d.getTime())) {
        return { filePath, timestamp: d, isDaily: true, fileSize: statSync(filePath).size };
      }
    }

    return null;
  }

  private versionPath(d: Date): string {
    return join(this.backupDir, `${this.prefix}${fileTimestamp(d)}${BACKUP_EXT}`);
  }

  private dailyPath(d: Date): string {
    return join(this.backupDir, `${this.prefix}${DAILY_PREFIX}${formatDate(d)}${BACKUP_EXT}`);
  }

  private preRestorePath(d: Date): string {
    return join(this.backupDir, `${this.prefix}${PRE_RESTORE_PREFIX}${fileTimestamp(d)}${BACKUP_EXT}`);
  }
}
