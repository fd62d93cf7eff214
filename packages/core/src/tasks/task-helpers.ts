/**
 * @fileoverview Helpers for callers of the task core
 */

import { ValidationError } from '../errors/task-errors.js';
import { ok, err, type Result } from '../types/result.js';
import type { Task } from '../types/task.js';

const ID_PATTERN = /^\d+$/;

/**
 * Parse a task id typed by the user.
 * Accepts a positive decimal integer, surrounding whitespace allowed.
 */
export function parseTaskId(raw: string): Result<number, ValidationError> {
  const normalized = raw.trim();
  if (!ID_PATTERN.test(normalized)) {
    return err(ValidationError.invalidId(raw));
  }

  const id = Number(normalized);
  if (!Number.isSafeInteger(id) || id < 1) {
    return err(ValidationError.invalidId(raw));
  }

  return ok(id);
}

/**
 * Split tasks by status, keeping relative order within each group
 */
export function partitionTasks(tasks: readonly Task[]): { pending: Task[]; completed: Task[] } {
  const pending: Task[] = [];
  const completed: Task[] = [];
  for (const task of tasks) {
    (task.completed ? completed : pending).push(task);
  }
  return { pending, completed };
}
