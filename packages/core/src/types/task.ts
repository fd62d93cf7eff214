/**
 * @fileoverview Task Types
 *
 * Core types for the task collection and its on-disk representation.
 */

// =============================================================================
// Task
// =============================================================================

/**
 * A single task in the collection.
 * Only `completed` ever changes after creation.
 */
export interface Task {
  /** Positive integer, unique within the collection */
  id: number;

  /** Trimmed, never empty */
  description: string;

  completed: boolean;

  /** Local creation time, formatted `YYYY-MM-DD HH:MM` */
  createdAt: string;
}

/** Counts shown beneath a rendered task list */
export interface TaskSummary {
  total: number;
  completed: number;
  pending: number;
}

// =============================================================================
// Persisted Records
// =============================================================================

/**
 * One entry of the JSON array written by the store.
 */
export interface TaskRecord {
  id: number;
  description: string;
  completed: boolean;
  created_at: string;
}

/**
 * Entry written by the first release of the tracker, before tasks had ids.
 */
export interface LegacyTaskRecord {
  task: string;
  completed: boolean;
  created: string;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Time source used when stamping new tasks.
 */
export interface Clock {
  now(): Date;
}
