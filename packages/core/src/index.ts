/**
 * @fileoverview Main entry point for @tickit/core
 *
 * Task persistence and task-state management for the tickit command-line
 * tracker. Rendering and argument parsing live with the caller.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './settings/index.js';
export * from './tasks/index.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'tickit';
