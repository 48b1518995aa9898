import type { Task, TaskId, TaskFields, TaskRecord } from '../types/task.js';
import { TaskKind } from '../types/task.js';
import type { Category } from '../types/category.js';
import { DEFAULT_CATEGORY, LEGACY_CATEGORY_LABELS, parseCategory, CATEGORIES } from '../types/category.js';
import { Urgency } from '../types/urgency.js';
import { ValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import { daysUntil, formatDate, parseDeadline } from '../parsers/date-parser.js';
import type { StoredTaskRecord } from './task-schema.js';

const log = createLogger('model');

/** Default number of days before a deadline at which an open task becomes urgent */
export const URGENCY_WINDOW_DAYS = 3;

/**
 * Check user-supplied fields. Returns the list of problems, empty when valid.
 * Shared by create and edit.
 */
export function validateTaskFields(fields: TaskFields): string[] {
  const issues: string[] = [];

  if (!fields.title.trim()) {
    issues.push('Title must not be empty');
  }

  const deadline = fields.deadline.trim();
  if (!deadline) {
    issues.push('Deadline must not be empty');
  } else if (!parseDeadline(deadline)) {
    issues.push(`Deadline '${deadline}' must be a valid date in DD-MM-YYYY format (e.g. 25-12-2026)`);
  }

  if (fields.category !== undefined && parseCategory(fields.category) === null) {
    issues.push(`Unknown category '${fields.category}'. Use one of: ${CATEGORIES.join(', ')}`);
  }

  return issues;
}

function resolveCategory(input: string | undefined, fallback: Category): Category {
  if (input === undefined) return fallback;
  return parseCategory(input) ?? fallback;
}

/** Category of a stored record. Older labels are translated; anything else becomes the default. */
function storedCategory(value: string | undefined, id: TaskId): Category {
  if (value === undefined) return DEFAULT_CATEGORY;

  const category = parseCategory(value) ?? LEGACY_CATEGORY_LABELS[value.trim().toLowerCase()];
  if (category) return category;

  log.debug(`task ${id}: unknown category '${value}', using ${DEFAULT_CATEGORY}`);
  return DEFAULT_CATEGORY;
}

/** Next id: one above both the highest id present and the high-water mark */
export function nextTaskId(tasks: readonly Task[], highWater = 0): TaskId {
  return tasks.reduce((max, t) => Math.max(max, t.id), highWater) + 1;
}

/** Create a new task. Throws ValidationError if the fields are invalid. */
export function createTask(
  fields: TaskFields,
  id: TaskId,
  now: Date = new Date(),
  defaultCategory: Category = DEFAULT_CATEGORY,
): Task {
  const issues = validateTaskFields(fields);
  if (issues.length > 0) throw new ValidationError(issues);

  return {
    type: TaskKind.Deadline,
    id,
    title: fields.title.trim(),
    description: (fields.description ?? '').trim(),
    category: resolveCategory(fields.category, defaultCategory),
    deadline: fields.deadline.trim(),
    completed: false,
    createdDate: formatDate(now),
  };
}

/**
 * Return a copy of the task with the given fields replaced.
 * Omitted fields keep their current value. Throws ValidationError.
 */
export function applyEdit(task: Task, changes: Partial<TaskFields>): Task {
  const merged: TaskFields = {
    title: changes.title ?? task.title,
    description: changes.description ?? task.description,
    deadline: changes.deadline ?? task.deadline,
    category: changes.category ?? task.category,
  };

  const issues = validateTaskFields(merged);
  if (issues.length > 0) throw new ValidationError(issues);

  return {
    ...task,
    title: merged.title.trim(),
    description: (merged.description ?? '').trim(),
    deadline: merged.deadline.trim(),
    category: resolveCategory(merged.category, task.category),
  };
}

/** Return a copy of the task with completion flipped */
export function toggleCompletion(task: Task): Task {
  return { ...task, completed: !task.completed };
}

/** Urgent / Pending / Done. An unparseable deadline counts as Pending. */
export function urgencyLabel(task: Task, now: Date = new Date(), windowDays = URGENCY_WINDOW_DAYS): Urgency {
  if (task.completed) return Urgency.Done;

  const days = daysUntil(task.deadline, now);
  if (days === null) return Urgency.Pending;
  return days < windowDays ? Urgency.Urgent : Urgency.Pending;
}

/** Detail line, e.g. `[✓] Report | Deadline: 25-12-2026` */
export function describeTask(task: Task): string {
  const status = task.completed ? '✓' : '✗';
  switch (task.type) {
    case TaskKind.Deadline:
      return `[${status}] ${task.title} | Deadline: ${task.deadline || '-'}`;
  }
}

export function serializeTask(task: Task): TaskRecord {
  switch (task.type) {
    case TaskKind.Deadline:
      return {
        id: task.id,
        title: task.title,
        description: task.description,
        category: task.category,
        completed: task.completed,
        created_date: task.createdDate,
        deadline: task.deadline,
        type: task.type,
      };
  }
}

/**
 * Rebuild a task from a stored record. Missing deadline becomes '',
 * missing or unknown category becomes the default, missing completed is false.
 */
export function deserializeTask(record: StoredTaskRecord, now: Date = new Date()): Task {
  const category = storedCategory(record.category, record.id);

  switch (record.type) {
    case undefined:
    case 'Task':
    case TaskKind.Deadline:
      return {
        type: TaskKind.Deadline,
        id: record.id,
        title: record.title,
        description: record.description,
        category,
        deadline: record.deadline ?? '',
        completed: record.completed ?? false,
        createdDate: record.created_date ?? formatDate(now),
      };
  }
}
