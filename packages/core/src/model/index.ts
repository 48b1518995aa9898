export {
  URGENCY_WINDOW_DAYS,
  validateTaskFields,
  nextTaskId,
  createTask,
  applyEdit,
  toggleCompletion,
  urgencyLabel,
  describeTask,
  serializeTask,
  deserializeTask,
} from './task-model.js';
export { StoredTaskRecordSchema, TaskFileSchema } from './task-schema.js';
export type { StoredTaskRecord } from './task-schema.js';
