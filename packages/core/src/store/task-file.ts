/**
 * Whole-file JSON persistence for the task list.
 * Writes go to a sibling temp file that is then renamed over the target.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { TaskRecord } from '../types/task.js';
import { PersistenceReadError, errorMessage } from '../errors.js';
import { TaskFileSchema, describeIssues } from '../model/task-schema.js';
import type { StoredTaskRecord } from '../model/task-schema.js';

export type ReadOutcome =
  | { readonly type: 'missing' }
  | { readonly type: 'ok'; readonly records: StoredTaskRecord[] }
  | { readonly type: 'malformed'; readonly error: PersistenceReadError };

export function readTaskFile(filePath: string): ReadOutcome {
  if (!existsSync(filePath)) return { type: 'missing' };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    return { type: 'malformed', error: new PersistenceReadError(filePath, errorMessage(err), { cause: err }) };
  }

  const parsed = TaskFileSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      type: 'malformed',
      error: new PersistenceReadError(filePath, describeIssues(parsed.error), { cause: parsed.error }),
    };
  }
  return { type: 'ok', records: parsed.data };
}

/** Serialize records as pretty-printed JSON and replace the file. Throws on I/O failure. */
export function writeTaskFile(filePath: string, records: readonly TaskRecord[]): void {
  const tmpPath = `${filePath}.tmp`;
  try {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(tmpPath, JSON.stringify(records, null, 4) + '\n', 'utf8');
    renameSync(tmpPath, filePath);
  } catch (err) {
    if (existsSync(tmpPath)) rmSync(tmpPath);
    throw err;
  }
}

/** Filesystem-safe timestamp, yyyy-MM-ddTHH-mm-ss */
export function fileTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}T${pad(d.getHours())}-${pad(d.getMinutes())}-${pad(d.getSeconds())}`;
}

/**
 * Copy an unreadable task file aside so the next save does not overwrite it.
 * Returns the copy's path.
 */
export function quarantineTaskFile(filePath: string, now: Date = new Date()): string {
  const dest = `${filePath}.corrupt-${fileTimestamp(now)}`;
  copyFileSync(filePath, dest);
  return dest;
}
