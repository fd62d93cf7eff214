/**
 * @fileoverview Task Store
 *
 * Persists the task collection as a JSON array. Loading never fails: a
 * missing, unreadable or malformed file yields an empty collection. Saving
 * reports write failures as an IOFailure result.
 *
 * Writes are atomic (write to tmp file, then rename) so a crash mid-write
 * never leaves a truncated file behind. Two processes saving the same file
 * still race; the last rename wins.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { IOFailure, toError } from '../errors/task-errors.js';
import { createLogger, type TickitLogger } from '../logging/logger.js';
import { ok, err, type Result } from '../types/result.js';
import type { Task } from '../types/task.js';
import { decodeTaskFile, encodeTaskFile } from './task-codec.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Persistence boundary used by TaskManager.
 * Implementations serialize snapshots and keep no reference to them.
 */
export interface TaskStore {
  load(): Task[];
  save(tasks: readonly Task[]): Result<void, IOFailure>;
}

export interface JsonTaskStoreOptions {
  /** JSON indentation (default: 2) */
  indent?: number;
  logger?: TickitLogger;
}

// =============================================================================
// JsonTaskStore
// =============================================================================

export class JsonTaskStore implements TaskStore {
  readonly filePath: string;
  private readonly indent: number;
  private readonly logger: TickitLogger;

  constructor(filePath: string, options: JsonTaskStoreOptions = {}) {
    this.filePath = filePath;
    this.indent = options.indent ?? 2;
    this.logger = options.logger ?? createLogger('task-store');
  }

  load(): Task[] {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      const cause = toError(error);
      if ('code' in cause && cause.code === 'ENOENT') {
        this.logger.debug('No task file yet, starting empty', { path: this.filePath });
      } else {
        this.logger.debug('Task file unreadable, starting empty', {
          path: this.filePath,
          err: cause.message,
        });
      }
      return [];
    }

    const decoded = decodeTaskFile(content);
    if (!decoded.ok) {
      this.logger.debug('Task file discarded', {
        path: this.filePath,
        reason: decoded.error.reason,
        detail: decoded.error.message,
        paths: decoded.error.paths,
      });
      return [];
    }

    this.logger.debug('Tasks loaded', { path: this.filePath, count: decoded.value.length });
    return decoded.value;
  }

  save(tasks: readonly Task[]): Result<void, IOFailure> {
    const done = this.logger.startTimer('Task save');
    const tmpPath = `${this.filePath}.${randomUUID()}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, encodeTaskFile(tasks, this.indent), 'utf-8');
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      const failure = new IOFailure(this.filePath, toError(error));
      this.removeTmp(tmpPath);
      this.logger.debug('Task save failed', { path: this.filePath, err: failure.cause.message });
      return err(failure);
    }

    done();
    return ok(undefined);
  }

  private removeTmp(tmpPath: string): void {
    try {
      fs.rmSync(tmpPath, { force: true });
    } catch (error) {
      this.logger.debug('Could not remove temporary task file', {
        path: tmpPath,
        err: toError(error).message,
      });
    }
  }
}

/**
 * Create a store for the given task file
 */
export function createJsonTaskStore(filePath: string, options?: JsonTaskStoreOptions): JsonTaskStore {
  return new JsonTaskStore(filePath, options);
}
