export { TaskStore } from './task-store.js';
export type { TaskStoreOptions, BackupHook } from './task-store.js';
export { readTaskFile, writeTaskFile } from './task-file.js';
export type { ReadOutcome } from './task-file.js';
