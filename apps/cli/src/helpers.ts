/**
 * CLI helpers: error handling and argument parsing.
 */

import { errorMessage, normalizeDeadline } from '@tododesk/core';
import type { TaskId } from '@tododesk/core';
import * as out from './output.js';

/**
 * Run a command action, printing any thrown error instead of crashing.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(errorMessage(err));
  }
}

export function parseTaskId(raw: string): TaskId {
  const id = Number(raw.trim());
  if (!Number.isInteger(id) || id < 1) {
    throw new Error(`Invalid task id '${raw}'. Ids are positive whole numbers`);
  }
  return id;
}

export function parseTaskIds(raw: readonly string[]): TaskId[] {
  return raw.map(parseTaskId);
}

/** One-based position in the `backup list` output */
export function parseBackupIndex(raw: string): number {
  const index = Number(raw.trim());
  if (!raw.trim() || !Number.isInteger(index) || index < 1) {
    throw new Error(`Invalid backup number '${raw}'. Use a number from 'backup list'`);
  }
  return index;
}

/**
 * Expand shortcuts such as "tomorrow" or "+3d". Input that can't be read
 * is passed through unchanged so validation reports it.
 */
export function resolveDeadlineArg(raw: string, now: Date): string {
  return normalizeDeadline(raw, now) ?? raw;
}

export function formatTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}
