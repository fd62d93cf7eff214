/**
 * @fileoverview Task Module Exports
 */

export { TaskManager, systemClock, type TaskManagerOptions } from './task-manager.js';

export {
  JsonTaskStore,
  createJsonTaskStore,
  type TaskStore,
  type JsonTaskStoreOptions,
} from './task-store.js';

export {
  decodeTaskFile,
  encodeTaskFile,
  formatTimestamp,
  toRecord,
  taskRecordSchema,
  legacyTaskRecordSchema,
  TIMESTAMP_PATTERN,
  type DecodeFailure,
  type DecodeFailureReason,
} from './task-codec.js';

export { parseTaskId, partitionTasks } from './task-helpers.js';

export {
  openTaskManager,
  type OpenTaskManagerOptions,
  type OpenedTaskManager,
} from './open.js';
