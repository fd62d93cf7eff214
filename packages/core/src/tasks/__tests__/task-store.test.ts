import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { randomUUID } from 'crypto';
import { JsonTaskStore } from '../task-store.js';
import { IOFailure } from '../../errors/task-errors.js';
import { TickitLogger } from '../../logging/logger.js';
import type { Task } from '../../types/task.js';

describe('JsonTaskStore', () => {
  let tmpDir: string;
  let tasksPath: string;
  let store: JsonTaskStore;
  const logger = new TickitLogger({ level: 'silent' });

  function makeTask(overrides: Partial<Task> = {}): Task {
    return {
      id: 1,
      description: 'Buy milk',
      completed: false,
      createdAt: '2024-01-15 09:05',
      ...overrides,
    };
  }

  beforeEach(() => {
    tmpDir = path.join(os.tmpdir(), `tickit-store-test-${randomUUID()}`);
    fs.mkdirSync(tmpDir, { recursive: true });
    tasksPath = path.join(tmpDir, 'tasks.json');
    store = new JsonTaskStore(tasksPath, { logger });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('returns an empty collection when the file is missing', () => {
      expect(store.load()).toEqual([]);
    });

    it('does not create the file on load', () => {
      store.load();
      expect(fs.existsSync(tasksPath)).toBe(false);
    });

    it('returns an empty collection for corrupt JSON', () => {
      fs.writeFileSync(tasksPath, 'not valid json {{{');

      expect(store.load()).toEqual([]);
    });

    it('returns an empty collection for structurally invalid content', () => {
      fs.writeFileSync(tasksPath, JSON.stringify([{ id: 1, description: 'Missing fields' }]));

      expect(store.load()).toEqual([]);
    });

    it('returns an empty collection when the path is a directory', () => {
      fs.mkdirSync(tasksPath);

      expect(store.load()).toEqual([]);
    });

    it('leaves a corrupt file untouched', () => {
      fs.writeFileSync(tasksPath, '\u0000\u0001garbage');
      store.load();

      expect(fs.readFileSync(tasksPath, 'utf-8')).toBe('\u0000\u0001garbage');
    });

    it('loads legacy files without ids', () => {
      fs.writeFileSync(
        tasksPath,
        JSON.stringify([{ task: 'Legacy task', completed: false, created: '2023-05-01 10:00' }])
      );

      expect(store.load()).toEqual([
        { id: 1, description: 'Legacy task', completed: false, createdAt: '2023-05-01 10:00' },
      ]);
    });
  });

  describe('save', () => {
    it('round-trips a collection in order', () => {
      const tasks = [
        makeTask({ id: 2, description: 'Read book', completed: true }),
        makeTask({ id: 1, description: 'Buy milk' }),
        makeTask({ id: 7, description: 'Café ☕', createdAt: '2024-02-29 23:59' }),
      ];

      expect(store.save(tasks)).toEqual({ ok: true, value: undefined });
      expect(new JsonTaskStore(tasksPath, { logger }).load()).toEqual(tasks);
    });

    it('overwrites the previous contents', () => {
      store.save([makeTask({ id: 1 }), makeTask({ id: 2 })]);
      store.save([makeTask({ id: 2 })]);

      expect(store.load().map((t) => t.id)).toEqual([2]);
    });

    it('writes the documented record format', () => {
      store.save([makeTask()]);

      expect(JSON.parse(fs.readFileSync(tasksPath, 'utf-8'))).toEqual([
        { id: 1, description: 'Buy milk', completed: false, created_at: '2024-01-15 09:05' },
      ]);
    });

    it('uses the configured indent', () => {
      const compact = new JsonTaskStore(tasksPath, { indent: 0, logger });
      compact.save([]);

      expect(fs.readFileSync(tasksPath, 'utf-8')).toBe('[]\n');
    });

    it('creates missing parent directories', () => {
      const nested = new JsonTaskStore(path.join(tmpDir, 'a', 'b', 'tasks.json'), { logger });

      expect(nested.save([makeTask()]).ok).toBe(true);
      expect(nested.load()).toHaveLength(1);
    });

    it('leaves no temporary files behind', () => {
      store.save([makeTask()]);

      expect(fs.readdirSync(tmpDir)).toEqual(['tasks.json']);
    });

    it('returns IOFailure when the file cannot be written', () => {
      const blocker = path.join(tmpDir, 'blocker');
      fs.writeFileSync(blocker, 'a file, not a directory');
      const blocked = new JsonTaskStore(path.join(blocker, 'tasks.json'), { logger });

      const result = blocked.save([makeTask()]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(IOFailure);
        expect(result.error.path).toBe(path.join(blocker, 'tasks.json'));
      }
    });

    it('does not keep a reference to the saved array', () => {
      const tasks = [makeTask()];
      store.save(tasks);
      tasks.push(makeTask({ id: 2 }));

      expect(store.load()).toHaveLength(1);
    });
  });
});
