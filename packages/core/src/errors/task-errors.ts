/**
 * @fileoverview Task Error Types
 *
 * Typed error hierarchy for the task core. Instances are returned inside
 * a Result, never thrown to callers.
 */

/**
 * Centralized task error codes
 */
export const TaskErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  IO_FAILURE: 'IO_FAILURE',
} as const;

export type TaskErrorCodeType = (typeof TaskErrorCode)[keyof typeof TaskErrorCode];

/** Why user input was rejected */
export type ValidationReason = 'EMPTY_DESCRIPTION' | 'INVALID_ID' | 'ID_EXHAUSTED';

/**
 * Base task error class
 */
export class TaskError extends Error {
  constructor(
    public readonly code: TaskErrorCodeType,
    message: string
  ) {
    super(message);
    this.name = 'TaskError';
  }
}

/**
 * Bad user input: empty description or an unparseable task id
 */
export class ValidationError extends TaskError {
  constructor(
    public readonly reason: ValidationReason,
    message: string
  ) {
    super(TaskErrorCode.VALIDATION_ERROR, message);
    this.name = 'ValidationError';
  }

  static emptyDescription(): ValidationError {
    return new ValidationError('EMPTY_DESCRIPTION', 'Task description cannot be empty');
  }

  static invalidId(raw: string): ValidationError {
    return new ValidationError('INVALID_ID', `Invalid task id: ${raw}`);
  }

  static idExhausted(): ValidationError {
    return new ValidationError('ID_EXHAUSTED', `Task id limit reached (${Number.MAX_SAFE_INTEGER})`);
  }
}

/**
 * Referenced task id does not exist in the collection
 */
export class NotFoundError extends TaskError {
  constructor(public readonly taskId: number) {
    super(TaskErrorCode.NOT_FOUND, `Task not found: ${taskId}`);
    this.name = 'NotFoundError';
  }
}

/**
 * The task file could not be written
 */
export class IOFailure extends TaskError {
  constructor(
    public readonly path: string,
    public readonly cause: Error
  ) {
    super(TaskErrorCode.IO_FAILURE, `Failed to save tasks to ${path}: ${cause.message}`);
    this.name = 'IOFailure';
  }
}

/**
 * Check if a value is a TaskError
 */
export function isTaskError(error: unknown): error is TaskError {
  return error instanceof TaskError;
}

/**
 * Normalize anything caught from fs into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
