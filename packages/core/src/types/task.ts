import type { Category } from './category.js';

export type TaskId = number;

/** Discriminant values stored in the `type` field of each record */
export const TaskKind = {
  Deadline: 'DeadlineTask',
} as const;

export type TaskKind = (typeof TaskKind)[keyof typeof TaskKind];

export interface DeadlineTask {
  readonly type: typeof TaskKind.Deadline;
  readonly id: TaskId;
  readonly title: string;
  readonly description: string;
  readonly category: Category;
  readonly deadline: string; // DD-MM-YYYY, '' when a legacy record had none
  readonly completed: boolean;
  readonly createdDate: string; // YYYY-MM-DD
}

/** Closed set of task shapes. Add variants here and match on `type`. */
export type Task = DeadlineTask;

/** User-supplied fields, shared by create and edit */
export interface TaskFields {
  title: string;
  description?: string;
  deadline: string;
  category?: string;
}

/** On-disk record shape (snake_case keys) */
export interface TaskRecord {
  id: number;
  title: string;
  description: string;
  category: string;
  completed: boolean;
  created_date: string;
  deadline: string;
  type: TaskKind;
}
