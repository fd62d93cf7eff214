/**
 * @fileoverview Default Settings
 *
 * Fallback values used when the user settings file or the environment
 * does not specify them.
 */

import type { TickitSettings } from './types.js';

export const DEFAULT_TASKS_FILE = 'tasks.json';

export const DEFAULT_SETTINGS: TickitSettings = {
  version: '0.1.0',
  storage: {
    tasksFile: DEFAULT_TASKS_FILE,
    indent: 2,
  },
  logging: {
    level: 'warn',
    pretty: false,
  },
};
