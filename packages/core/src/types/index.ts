/**
 * @fileoverview Public type exports for @tickit/core
 */

export type {
  Task,
  TaskSummary,
  TaskRecord,
  LegacyTaskRecord,
  Clock,
} from './task.js';

export { ok, err, isOk, isErr, type Result } from './result.js';
