/**
 * @fileoverview Settings Module
 *
 * Configuration for tickit. Settings are loaded from ~/.tickit/settings.json
 * with defaults, then overridden from the environment.
 *
 * @example
 * ```typescript
 * import { getSettings, resolveTasksFilePath } from '@tickit/core';
 *
 * const settings = getSettings();
 * const tasksFile = resolveTasksFilePath(settings);
 * ```
 */

export type {
  TickitSettings,
  UserSettings,
  DeepPartial,
  StorageSettings,
  LoggingSettings,
} from './types.js';

export { DEFAULT_SETTINGS, DEFAULT_TASKS_FILE } from './defaults.js';

export {
  getSettings,
  reloadSettings,
  loadSettings,
  loadUserSettings,
  getSettingsPath,
  getSettingsDir,
  setSettingsPath,
  clearSettingsCache,
  applyEnvOverrides,
  resolveTasksFilePath,
  userSettingsSchema,
  envOverridesSchema,
  MAX_JSON_INDENT,
  type EnvOverrideVariable,
} from './loader.js';

