/**
 * @fileoverview Settings Types
 *
 * Shape of the tickit configuration, as merged from defaults, the user
 * settings file and environment overrides.
 */

import type { LogLevel } from '../logging/logger.js';

/**
 * Recursively optional version of a settings object
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface StorageSettings {
  /** Task file; relative paths resolve against the working directory */
  tasksFile: string;
  /** Spaces of JSON indentation in the task file */
  indent: number;
}

export interface LoggingSettings {
  level: LogLevel;
  pretty: boolean;
}

export interface TickitSettings {
  version: string;
  storage: StorageSettings;
  logging: LoggingSettings;
}

/** What a user may put in settings.json */
export type UserSettings = DeepPartial<TickitSettings>;
