/**
 * The task store: owns the ordered task list and mirrors it to a JSON file.
 * Every mutation rewrites the whole file. Positions are zero-based indexes
 * into the current list and are only valid until the next mutation; ids are
 * stable.
 */

import type { Task, TaskId, TaskFields } from '../types/task.js';
import type { Category } from '../types/category.js';
import { DEFAULT_CATEGORY } from '../types/category.js';
import { Urgency } from '../types/urgency.js';
import type { AddResult, ProgressSummary, TaskMatch, TaskResult } from '../types/results.js';
import { PersistenceReadError, PersistenceWriteError, ValidationError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import {
  applyEdit, createTask, deserializeTask, nextTaskId,
  serializeTask, toggleCompletion, urgencyLabel, URGENCY_WINDOW_DAYS,
} from '../model/task-model.js';
import { matchesText, parseSearchFilters } from '../parsers/search-filter-parser.js';
import type { SearchFilters, StatusFilter } from '../parsers/search-filter-parser.js';
import { quarantineTaskFile, readTaskFile, writeTaskFile } from './task-file.js';

const log = createLogger('store');

/** Anything that can snapshot the task file before it is rewritten */
export interface BackupHook {
  createBackup(): void;
}

export interface TaskStoreOptions {
  /** Clock used for creation dates and urgency. Defaults to the system clock. */
  now?: () => Date;
  defaultCategory?: Category;
  urgencyWindowDays?: number;
  /** Called before each save, while the previous file is still on disk */
  backup?: BackupHook | null;
}

export class TaskStore {
  readonly filePath: string;
  private items: Task[] = [];
  private highWater = 0;
  private lastLoadError: PersistenceReadError | null = null;
  private readonly now: () => Date;
  private readonly defaultCategory: Category;
  private readonly urgencyWindowDays: number;
  private readonly backup: BackupHook | null;

  constructor(filePath: string, options: TaskStoreOptions = {}) {
    this.filePath = filePath;
    this.now = options.now ?? (() => new Date());
    this.defaultCategory = options.defaultCategory ?? DEFAULT_CATEGORY;
    this.urgencyWindowDays = options.urgencyWindowDays ?? URGENCY_WINDOW_DAYS;
    this.backup = options.backup ?? null;
    this.load();
  }

  /** Build a store and load its file */
  static open(filePath: string, options?: TaskStoreOptions): TaskStore {
    return new TaskStore(filePath, options);
  }

  /** Snapshot of the task list in display order */
  get tasks(): readonly Task[] {
    return [...this.items];
  }

  get count(): number {
    return this.items.length;
  }

  /** Set when the last load found an unreadable file */
  get loadError(): PersistenceReadError | null {
    return this.lastLoadError;
  }

  // -------------------------------------------------------------------------
  // Loading and saving
  // -------------------------------------------------------------------------

  /** Discard memory and read the file again */
  reload(): void {
    this.load();
  }

  private load(): void {
    this.items = [];
    this.lastLoadError = null;

    const outcome = readTaskFile(this.filePath);
    switch (outcome.type) {
      case 'missing':
        log.debug(`no task file at ${this.filePath}, starting empty`);
        break;
      case 'malformed':
        this.lastLoadError = outcome.error;
        log.warn(outcome.error.message);
        this.quarantine();
        break;
      case 'ok': {
        const today = this.now();
        this.items = outcome.records.map(r => deserializeTask(r, today));
        log.debug(`loaded ${this.items.length} task(s) from ${this.filePath}`);
        break;
      }
    }
    this.highWater = nextTaskId(this.items) - 1;
  }

  private quarantine(): void {
    try {
      const copy = quarantineTaskFile(this.filePath, this.now());
      log.warn(`kept a copy of the unreadable file at ${copy}`);
    } catch (err) {
      log.error(`could not copy unreadable file ${this.filePath}:`, errorMessage(err));
    }
  }

  /**
   * Write the whole list to disk. Failures are logged and returned;
   * the in-memory list is kept either way.
   */
  persist(): PersistenceWriteError | null {
    this.backup?.createBackup();
    try {
      writeTaskFile(this.filePath, this.items.map(serializeTask));
      log.debug(`saved ${this.items.length} task(s) to ${this.filePath}`);
      return null;
    } catch (err) {
      const error = new PersistenceWriteError(this.filePath, errorMessage(err), { cause: err });
      log.error(error.message);
      return error;
    }
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  at(position: number): Task | null {
    return this.inRange(position) ? this.items[position]! : null;
  }

  getById(id: TaskId): Task | null {
    return this.items.find(t => t.id === id) ?? null;
  }

  /** Current position of a task id, or -1 */
  positionOf(id: TaskId): number {
    return this.items.findIndex(t => t.id === id);
  }

  /** Id the next added task will receive */
  peekNextId(): TaskId {
    return nextTaskId(this.items, this.highWater);
  }

  urgencyOf(task: Task): Urgency {
    return urgencyLabel(task, this.now(), this.urgencyWindowDays);
  }

  /** Tasks whose title, description or category contains the text, ignoring case */
  query(filterText: string): TaskMatch[] {
    const matches: TaskMatch[] = [];
    this.items.forEach((task, position) => {
      if (matchesText(task, filterText)) matches.push({ position, task });
    });
    return matches;
  }

  /** Like `query`, with `category:`, `status:` and `id:` filter tokens */
  search(queryText: string): TaskMatch[] {
    const filters = parseSearchFilters(queryText);
    return this.query(filters.text).filter(({ task }) => this.matchesFilters(task, filters));
  }

  progressSummary(): ProgressSummary {
    const total = this.items.length;
    const done = this.items.filter(t => t.completed).length;
    return {
      total,
      done,
      pending: total - done,
      percent: total > 0 ? Math.round((done / total) * 100) : 0,
    };
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  /** Validate, assign the next id, append and save. Throws ValidationError. */
  add(fields: TaskFields): AddResult {
    const task = createTask(fields, this.peekNextId(), this.now(), this.defaultCategory);
    this.items.push(task);
    this.highWater = Math.max(this.highWater, task.id);
    return { task, persistError: this.persist() };
  }

  delete(position: number): TaskResult {
    if (!this.inRange(position)) return notFoundAt(position);

    const [removed] = this.items.splice(position, 1);
    const task = removed!;
    return {
      type: 'success',
      message: `Deleted task ${task.id}: ${task.title}`,
      task,
      persistError: this.persist(),
    };
  }

  toggle(position: number): TaskResult {
    if (!this.inRange(position)) return notFoundAt(position);

    const task = toggleCompletion(this.items[position]!);
    this.items[position] = task;
    return {
      type: 'success',
      message: `Marked task ${task.id} as ${task.completed ? 'done' : 'pending'}`,
      task,
      persistError: this.persist(),
    };
  }

  /** Replace user fields after the same validation as `add`. Invalid input changes nothing. */
  edit(position: number, changes: Partial<TaskFields>): TaskResult {
    if (!this.inRange(position)) return notFoundAt(position);

    let task: Task;
    try {
      task = applyEdit(this.items[position]!, changes);
    } catch (err) {
      if (err instanceof ValidationError) {
        return { type: 'invalid', message: err.message, error: err };
      }
      throw err;
    }

    this.items[position] = task;
    return {
      type: 'success',
      message: `Updated task ${task.id}`,
      task,
      persistError: this.persist(),
    };
  }

  deleteById(id: TaskId): TaskResult {
    const position = this.positionOf(id);
    return position < 0 ? notFoundId(id) : this.delete(position);
  }

  toggleById(id: TaskId): TaskResult {
    const position = this.positionOf(id);
    return position < 0 ? notFoundId(id) : this.toggle(position);
  }

  editById(id: TaskId, changes: Partial<TaskFields>): TaskResult {
    const position = this.positionOf(id);
    return position < 0 ? notFoundId(id) : this.edit(position, changes);
  }

  // -------------------------------------------------------------------------

  private inRange(position: number): boolean {
    return Number.isInteger(position) && position >= 0 && position < this.items.length;
  }

  private matchesStatus(task: Task, status: StatusFilter): boolean {
    switch (status) {
      case 'done': return task.completed;
      case 'open': return !task.completed;
      case 'urgent': return this.urgencyOf(task) === Urgency.Urgent;
      case 'pending': return this.urgencyOf(task) === Urgency.Pending;
    }
  }

  private matchesFilters(task: Task, f: SearchFilters): boolean {
    if (f.ids.length > 0 && !f.ids.includes(task.id)) return false;
    if (f.categories.length > 0 && !f.categories.includes(task.category)) return false;
    if (f.notCategories.includes(task.category)) return false;
    if (f.status && !this.matchesStatus(task, f.status)) return false;
    if (f.notStatus && this.matchesStatus(task, f.notStatus)) return false;
    return true;
  }
}

function notFoundAt(position: number): TaskResult {
  return { type: 'not-found', message: `No task at position ${position}` };
}

function notFoundId(id: TaskId): TaskResult {
  return { type: 'not-found', message: `Could not find task with id ${id}` };
}
