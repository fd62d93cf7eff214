/**
 * @fileoverview Settings Loader
 *
 * Loads ~/.tickit/settings.json, validates it, and merges it over the
 * defaults. Environment variables take precedence over the file.
 * Settings are cached after the first load.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { createLogger, LOG_LEVELS, type TickitLogger } from '../logging/logger.js';
import type { TickitSettings, UserSettings } from './types.js';
import { DEFAULT_SETTINGS } from './defaults.js';

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.tickit';
const SETTINGS_FILE = 'settings.json';

export const MAX_JSON_INDENT = 8;

// =============================================================================
// Validation
// =============================================================================

export const userSettingsSchema = z
  .object({
    version: z.string(),
    storage: z
      .object({
        tasksFile: z.string().min(1, 'tasksFile must not be empty'),
        indent: z.number().int().min(0).max(MAX_JSON_INDENT),
      })
      .partial(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS),
        pretty: z.boolean(),
      })
      .partial(),
  })
  .partial();

const TRUE_WORDS = ['true', '1', 'yes', 'on'] as const;
const FALSE_WORDS = ['false', '0', 'no', 'off'] as const;

/**
 * One schema per environment variable, each taking the raw string.
 * A variable that fails its schema is skipped on its own.
 */
export const envOverridesSchema = {
  TICKIT_TASKS_FILE: z.string(),
  TICKIT_JSON_INDENT: z
    .string()
    .trim()
    .regex(/^\d+$/, 'expected a whole number')
    .transform(Number)
    .pipe(z.number().int().min(0).max(MAX_JSON_INDENT)),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)),
  TICKIT_LOG_PRETTY: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum([...TRUE_WORDS, ...FALSE_WORDS]))
    .transform((word) => TRUE_WORDS.some((t) => t === word)),
};

export type EnvOverrideVariable = keyof typeof envOverridesSchema;

// =============================================================================
// Merge
// =============================================================================

function mergeSettings(base: TickitSettings, user: UserSettings): TickitSettings {
  return {
    version: user.version ?? base.version,
    storage: { ...base.storage, ...user.storage },
    logging: { ...base.logging, ...user.logging },
  };
}

// =============================================================================
// Settings Loading
// =============================================================================

/**
 * Get the path to the settings file
 */
export function getSettingsPath(homeDir?: string): string {
  const home = homeDir ?? os.homedir();
  return path.join(home, SETTINGS_DIR, SETTINGS_FILE);
}

/**
 * Get the path to the settings directory
 */
export function getSettingsDir(homeDir?: string): string {
  const home = homeDir ?? os.homedir();
  return path.join(home, SETTINGS_DIR);
}

/**
 * Load user settings from file
 * @returns User settings, or null if the file is missing or invalid
 */
export function loadUserSettings(settingsPath?: string): UserSettings | null {
  const filePath = settingsPath ?? getSettingsPath();

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    createLogger('settings').warn('Failed to read settings, using defaults', {
      path: filePath,
      err: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    createLogger('settings').warn('Settings file is not valid JSON, using defaults', {
      path: filePath,
      err: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const parsed = userSettingsSchema.safeParse(json);
  if (!parsed.success) {
    createLogger('settings').warn('Settings file has invalid values, using defaults', {
      path: filePath,
      issues: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }

  return parsed.data;
}

/**
 * Load and merge settings with defaults
 */
export function loadSettings(settingsPath?: string): TickitSettings {
  const userSettings = loadUserSettings(settingsPath);

  if (!userSettings) {
    return {
      ...DEFAULT_SETTINGS,
      storage: { ...DEFAULT_SETTINGS.storage },
      logging: { ...DEFAULT_SETTINGS.logging },
    };
  }

  return mergeSettings(DEFAULT_SETTINGS, userSettings);
}

// =============================================================================
// Environment Variable Overrides
// =============================================================================

function readEnv<T>(
  env: NodeJS.ProcessEnv,
  variable: EnvOverrideVariable,
  schema: z.ZodType<T, z.ZodTypeDef, string>,
  logger: TickitLogger
): T | undefined {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Invalid environment value, ignoring it', {
      variable,
      value: raw,
      issues: parsed.error.errors.map((issue) => issue.message),
    });
    return undefined;
  }
  return parsed.data;
}

/**
 * Apply environment variable overrides to settings.
 * Unset, blank and invalid variables leave the setting as it was.
 */
export function applyEnvOverrides(
  settings: TickitSettings,
  env: NodeJS.ProcessEnv = process.env
): TickitSettings {
  const logger = createLogger('settings');
  const schemas = envOverridesSchema;

  return {
    ...settings,
    storage: {
      tasksFile:
        readEnv(env, 'TICKIT_TASKS_FILE', schemas.TICKIT_TASKS_FILE, logger) ??
        settings.storage.tasksFile,
      indent:
        readEnv(env, 'TICKIT_JSON_INDENT', schemas.TICKIT_JSON_INDENT, logger) ??
        settings.storage.indent,
    },
    logging: {
      level: readEnv(env, 'LOG_LEVEL', schemas.LOG_LEVEL, logger) ?? settings.logging.level,
      pretty:
        readEnv(env, 'TICKIT_LOG_PRETTY', schemas.TICKIT_LOG_PRETTY, logger) ??
        settings.logging.pretty,
    },
  };
}

// =============================================================================
// Singleton Settings Instance
// =============================================================================

/** Cached settings instance */
let cachedSettings: TickitSettings | null = null;

/** Custom settings path (for testing) */
let customSettingsPath: string | undefined;

/**
 * Get the current settings (loads and caches on first call).
 * Environment overrides are applied on top of the file.
 */
export function getSettings(): TickitSettings {
  if (!cachedSettings) {
    cachedSettings = applyEnvOverrides(loadSettings(customSettingsPath));
  }
  return cachedSettings;
}

/**
 * Reload settings from disk
 */
export function reloadSettings(): TickitSettings {
  cachedSettings = null;
  return getSettings();
}

/**
 * Set a custom settings path (mainly for testing)
 * Also clears the cache to force reload
 */
export function setSettingsPath(settingsPath: string | undefined): void {
  customSettingsPath = settingsPath;
  cachedSettings = null;
}

/**
 * Clear the settings cache (forces reload on next access)
 */
export function clearSettingsCache(): void {
  cachedSettings = null;
}

// =============================================================================
// Path Resolution
// =============================================================================

/**
 * Resolve the task file location. Relative paths are taken from `cwd`.
 */
export function resolveTasksFilePath(settings: TickitSettings, cwd: string = process.cwd()): string {
  return path.resolve(cwd, settings.storage.tasksFile);
}
