/**
 * @fileoverview Task Manager
 *
 * Owns the in-memory task collection for one process and keeps it in sync
 * with the store after every mutation.
 */

import { IOFailure, NotFoundError, ValidationError } from '../errors/task-errors.js';
import { createLogger, type TickitLogger } from '../logging/logger.js';
import { ok, err, type Result } from '../types/result.js';
import type { Clock, Task, TaskSummary } from '../types/task.js';
import { formatTimestamp } from './task-codec.js';
import type { TaskStore } from './task-store.js';

// =============================================================================
// Types
// =============================================================================

export interface TaskManagerOptions {
  /** Source of creation timestamps (default: system clock) */
  clock?: Clock;
  logger?: TickitLogger;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

// =============================================================================
// TaskManager
// =============================================================================

/**
 * TaskManager enforces the collection invariants:
 * - ids are unique and assigned as max id + 1
 * - descriptions are trimmed and never empty
 * - insertion order is never changed
 *
 * When a save fails the in-memory change is kept and the manager stays
 * dirty; any later save writes the full collection again.
 */
export class TaskManager {
  private readonly store: TaskStore;
  private readonly clock: Clock;
  private readonly logger: TickitLogger;
  private tasks: Task[];
  private dirty = false;

  constructor(store: TaskStore, options: TaskManagerOptions = {}) {
    this.store = store;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('task-manager');
    this.tasks = store.load();
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  add(description: string): Result<Task, ValidationError | IOFailure> {
    const text = description.trim();
    if (text.length === 0) {
      return err(ValidationError.emptyDescription());
    }

    const id = this.nextId();
    if (!Number.isSafeInteger(id)) {
      return err(ValidationError.idExhausted());
    }

    const task: Task = {
      id,
      description: text,
      completed: false,
      createdAt: formatTimestamp(this.clock.now()),
    };
    this.tasks.push(task);
    this.logger.debug('Task added', { taskId: task.id });

    return this.persist(task);
  }

  /**
   * Mark a task completed. Completing a completed task succeeds.
   */
  complete(id: number): Result<Task, NotFoundError | IOFailure> {
    const task = this.tasks.find((t) => t.id === id);
    if (!task) {
      return err(new NotFoundError(id));
    }

    task.completed = true;
    this.logger.debug('Task completed', { taskId: id });

    return this.persist(task);
  }

  remove(id: number): Result<Task, NotFoundError | IOFailure> {
    const index = this.tasks.findIndex((t) => t.id === id);
    if (index === -1) {
      return err(new NotFoundError(id));
    }

    const [removed] = this.tasks.splice(index, 1);
    if (!removed) {
      return err(new NotFoundError(id));
    }
    this.logger.debug('Task removed', { taskId: id });

    return this.persist(removed);
  }

  /**
   * Drop every completed task. Always saves, even when nothing was removed.
   * @returns number of tasks removed
   */
  clear(): Result<number, IOFailure> {
    const before = this.tasks.length;
    this.tasks = this.tasks.filter((t) => !t.completed);
    const removed = before - this.tasks.length;
    this.logger.debug('Completed tasks cleared', { count: removed });

    const saved = this.save();
    return saved.ok ? ok(removed) : saved;
  }

  /**
   * Retry a save left pending by an earlier failure. No-op when clean.
   */
  flush(): Result<void, IOFailure> {
    if (!this.dirty) {
      return ok(undefined);
    }
    return this.save();
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * All tasks in stored order, as copies
   */
  list(): Task[] {
    return this.tasks.map((t) => ({ ...t }));
  }

  summary(): TaskSummary {
    const completed = this.tasks.filter((t) => t.completed).length;
    return {
      total: this.tasks.length,
      completed,
      pending: this.tasks.length - completed,
    };
  }

  /** True while the last save attempt failed */
  get hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private nextId(): number {
    return this.tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
  }

  private persist(task: Task): Result<Task, IOFailure> {
    const saved = this.save();
    return saved.ok ? ok({ ...task }) : saved;
  }

  private save(): Result<void, IOFailure> {
    const result = this.store.save(this.tasks);
    this.dirty = !result.ok;
    if (!result.ok) {
      this.logger.debug('Changes kept in memory after failed save', {
        err: result.error.message,
      });
    }
    return result;
  }
}
