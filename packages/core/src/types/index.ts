export { Category, CATEGORIES, DEFAULT_CATEGORY, parseCategory, LEGACY_CATEGORY_LABELS } from './category.js';
export { Urgency } from './urgency.js';
export { TaskKind } from './task.js';
export type { TaskId, Task, DeadlineTask, TaskFields, TaskRecord } from './task.js';
export type { TaskResult, AddResult, ProgressSummary, TaskMatch } from './results.js';
