import type { Task } from './task.js';
import type { ValidationError, PersistenceWriteError } from '../errors.js';

/** Outcome of every position- or id-addressed store operation */
export type TaskResult =
  | {
      readonly type: 'success';
      readonly message: string;
      readonly task: Task;
      readonly persistError: PersistenceWriteError | null;
    }
  | { readonly type: 'not-found'; readonly message: string }
  | { readonly type: 'invalid'; readonly message: string; readonly error: ValidationError };

export interface AddResult {
  readonly task: Task;
  readonly persistError: PersistenceWriteError | null;
}

export interface ProgressSummary {
  readonly total: number;
  readonly done: number;
  readonly pending: number;
  readonly percent: number;
}

/** A task together with its position in the store at query time */
export interface TaskMatch {
  readonly position: number;
  readonly task: Task;
}
