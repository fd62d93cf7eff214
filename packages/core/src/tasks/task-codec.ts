/**
 * @fileoverview Task File Codec
 *
 * Strict decoding of the persisted task file into a Task collection, and
 * encoding of a collection back to JSON text. All parse failures are
 * reported here as a tagged result so malformed data never reaches the
 * manager.
 */

import { z, type ZodError } from 'zod';
import { ok, err, type Result } from '../types/result.js';
import type { Task, TaskRecord } from '../types/task.js';

// =============================================================================
// Timestamps
// =============================================================================

/** `YYYY-MM-DD HH:MM` */
export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as local `YYYY-MM-DD HH:MM`
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

// =============================================================================
// Schemas
// =============================================================================

const timestampSchema = z.string().regex(TIMESTAMP_PATTERN, 'expected YYYY-MM-DD HH:MM');

const descriptionSchema = z
  .string()
  .transform((value) => value.trim())
  .refine((value) => value.length > 0, 'description must not be empty');

export const taskRecordSchema = z
  .object({
    id: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
    description: descriptionSchema,
    completed: z.boolean(),
    created_at: timestampSchema,
  })
  .strict();

/** Records written before tasks carried ids */
export const legacyTaskRecordSchema = z
  .object({
    task: descriptionSchema,
    completed: z.boolean(),
    created: timestampSchema,
  })
  .strict();

const taskFileSchema = z.union([
  z.array(taskRecordSchema),
  z.array(legacyTaskRecordSchema),
]);

// =============================================================================
// Decoding
// =============================================================================

export type DecodeFailureReason = 'invalid_json' | 'invalid_shape' | 'duplicate_id';

export interface DecodeFailure {
  reason: DecodeFailureReason;
  message: string;
  /** Dot-separated paths of the offending values, when known */
  paths: string[];
}

function shapeFailure(error: ZodError): DecodeFailure {
  return {
    reason: 'invalid_shape',
    message: 'Task file does not match the expected shape',
    paths: error.errors.map((issue) => issue.path.join('.') || '(root)'),
  };
}

/**
 * Decode the raw contents of a task file.
 *
 * Accepts the current record format or, as a whole, the legacy id-less
 * format (ids are then assigned 1..n in array order). Any other content is
 * a failure; nothing is partially recovered.
 */
export function decodeTaskFile(raw: string): Result<Task[], DecodeFailure> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return err({
      reason: 'invalid_json',
      message: error instanceof Error ? error.message : String(error),
      paths: [],
    });
  }

  const parsed = taskFileSchema.safeParse(json);
  if (!parsed.success) {
    return err(shapeFailure(parsed.error));
  }

  const tasks: Task[] = parsed.data.map((record, index) =>
    'task' in record
      ? {
          id: index + 1,
          description: record.task,
          completed: record.completed,
          createdAt: record.created,
        }
      : {
          id: record.id,
          description: record.description,
          completed: record.completed,
          createdAt: record.created_at,
        }
  );

  const seen = new Set<number>();
  for (const [index, task] of tasks.entries()) {
    if (seen.has(task.id)) {
      return err({
        reason: 'duplicate_id',
        message: `Duplicate task id: ${task.id}`,
        paths: [`${index}.id`],
      });
    }
    seen.add(task.id);
  }

  return ok(tasks);
}

// =============================================================================
// Encoding
// =============================================================================

export function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    description: task.description,
    completed: task.completed,
    created_at: task.createdAt,
  };
}

/**
 * Serialize a collection as a JSON array terminated by a newline
 */
export function encodeTaskFile(tasks: readonly Task[], indent = 2): string {
  return `${JSON.stringify(tasks.map(toRecord), null, indent)}\n`;
}
