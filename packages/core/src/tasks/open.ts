/**
 * @fileoverview Task Manager Bootstrap
 *
 * Wires settings, logging, store and manager together for one process.
 */

import { configureLogger } from '../logging/logger.js';
import { getSettings, resolveTasksFilePath } from '../settings/loader.js';
import type { TickitSettings } from '../settings/types.js';
import type { Clock } from '../types/task.js';
import { TaskManager } from './task-manager.js';
import { JsonTaskStore } from './task-store.js';

export interface OpenTaskManagerOptions {
  /** Overrides the configured task file */
  tasksFile?: string;
  /** Base for relative task file paths (default: process.cwd()) */
  cwd?: string;
  /** Resolved settings (default: getSettings()) */
  settings?: TickitSettings;
  clock?: Clock;
}

export interface OpenedTaskManager {
  manager: TaskManager;
  store: JsonTaskStore;
  filePath: string;
}

/**
 * Load the task collection and return the manager that owns it
 */
export function openTaskManager(options: OpenTaskManagerOptions = {}): OpenedTaskManager {
  const base = options.settings ?? getSettings();
  const settings: TickitSettings = options.tasksFile
    ? { ...base, storage: { ...base.storage, tasksFile: options.tasksFile } }
    : base;

  const logger = configureLogger({
    level: settings.logging.level,
    pretty: settings.logging.pretty,
  });

  const filePath = resolveTasksFilePath(settings, options.cwd);
  const store = new JsonTaskStore(filePath, {
    indent: settings.storage.indent,
    logger: logger.child({ component: 'task-store' }),
  });
  const manager = new TaskManager(store, {
    clock: options.clock,
    logger: logger.child({ component: 'task-manager' }),
  });

  return { manager, store, filePath };
}
