import { describe, it, expect } from 'vitest';
import { parseTaskId, partitionTasks } from '../task-helpers.js';
import { ValidationError } from '../../errors/task-errors.js';
import type { Task } from '../../types/task.js';

describe('parseTaskId', () => {
  it('parses positive integers', () => {
    expect(parseTaskId('1')).toEqual({ ok: true, value: 1 });
    expect(parseTaskId(' 42 ')).toEqual({ ok: true, value: 42 });
  });

  it.each(['0', '-1', 'abc', '1.5', '', '1e3', '99999999999999999999'])('rejects %j', (raw) => {
    const result = parseTaskId(raw);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.reason).toBe('INVALID_ID');
      expect(result.error.message).toBe(`Invalid task id: ${raw}`);
    }
  });
});

describe('partitionTasks', () => {
  function task(id: number, completed: boolean): Task {
    return { id, description: `Task ${id}`, completed, createdAt: '2024-01-15 09:05' };
  }

  it('splits by status and keeps order within groups', () => {
    const { pending, completed } = partitionTasks([
      task(1, true),
      task(2, false),
      task(3, true),
      task(4, false),
    ]);

    expect(pending.map((t) => t.id)).toEqual([2, 4]);
    expect(completed.map((t) => t.id)).toEqual([1, 3]);
  });

  it('handles an empty list', () => {
    expect(partitionTasks([])).toEqual({ pending: [], completed: [] });
  });
});
