/**
 * @fileoverview Error exports
 */

export {
  TaskError,
  TaskErrorCode,
  ValidationError,
  NotFoundError,
  IOFailure,
  isTaskError,
  toError,
  type TaskErrorCodeType,
  type ValidationReason,
} from './task-errors.js';
