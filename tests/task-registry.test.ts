import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { TaskRegistry } from '../src/registry/task-registry.js';
import type { TaskStore } from '../src/registry/types.js';
import { DatabaseConnection } from '../src/database/connection.js';
import { SqliteTaskStore } from '../src/database/task-store.js';
import type { DownloadTask } from '../src/models/task.js';
import { createTempDir, removeDir } from '../src/utils/filesystem.js';
import { makeTask } from './helpers/tasks.js';

class MemoryStore implements TaskStore {
  public readonly rows = new Map<string, DownloadTask>();
  public writes = 0;

  loadAll(): DownloadTask[] {
    return Array.from(this.rows.values(), (task) => ({ ...task }));
  }

  save(task: DownloadTask): void {
    this.writes += 1;
    this.rows.set(task.id, { ...task });
  }

  saveMany(tasks: DownloadTask[]): void {
    for (const task of tasks) {
      this.save(task);
    }
  }

  delete(id: string): void {
    this.rows.delete(id);
  }
}

describe('TaskRegistry', () => {
  describe('in memory', () => {
    it('should store copies and hand out copies', () => {
      const registry = new TaskRegistry();
      const task = makeTask();

      registry.put(task);
      task.downloaded = 99;
      const read = registry.get(task.id);
      if (!read) throw new Error('task missing');
      read.status = 'completed';

      expect(registry.get(task.id)).toMatchObject({ downloaded: 0, status: 'pending' });
    });

    it('should list tasks in insertion order', () => {
      const registry = new TaskRegistry();
      const first = makeTask();
      const second = makeTask();
      registry.put(first);
      registry.put(second);
      registry.put({ ...first, downloaded: 5 });

      expect(registry.list().map((task) => task.id)).toEqual([first.id, second.id]);
      expect(registry.size()).toBe(2);
    });

    it('should remove tasks', () => {
      const registry = new TaskRegistry();
      const task = makeTask();
      registry.put(task);

      expect(registry.remove(task.id)).toBe(true);
      expect(registry.remove(task.id)).toBe(false);
      expect(registry.has(task.id)).toBe(false);
      expect(registry.get(task.id)).toBeUndefined();
    });

    it('should load nothing without a store', () => {
      expect(new TaskRegistry().load()).toBe(0);
    });
  });

  describe('with a store', () => {
    let store: MemoryStore;
    let registry: TaskRegistry;

    beforeEach(() => {
      store = new MemoryStore();
      registry = new TaskRegistry(store);
    });

    it('should write through on put', () => {
      const task = makeTask();
      registry.put(task);

      expect(store.rows.get(task.id)).toEqual(task);
    });

    it('should defer unpersisted changes until flush', () => {
      const task = makeTask();
      registry.put(task);
      registry.put({ ...task, downloaded: 4096 }, { persist: false });

      expect(store.rows.get(task.id)?.downloaded).toBe(0);
      expect(registry.get(task.id)?.downloaded).toBe(4096);

      registry.flush(task.id);
      expect(store.rows.get(task.id)?.downloaded).toBe(4096);

      const writes = store.writes;
      registry.flush();
      expect(store.writes).toBe(writes);
    });

    it('should flush every dirty task', () => {
      const first = makeTask();
      const second = makeTask();
      registry.put(first, { persist: false });
      registry.put(second, { persist: false });

      registry.flush();

      expect(Array.from(store.rows.keys())).toEqual([first.id, second.id]);
    });

    it('should reset interrupted downloads to paused on load', () => {
      const running = makeTask({ status: 'downloading', downloaded: 1200, totalSize: 5000 });
      const done = makeTask({ status: 'completed', downloaded: 10, totalSize: 10 });
      store.save(running);
      store.save(done);

      expect(registry.load()).toBe(1);

      expect(registry.get(running.id)).toMatchObject({ status: 'paused', downloaded: 1200 });
      expect(registry.get(done.id)?.status).toBe('completed');
      expect(store.rows.get(running.id)?.status).toBe('paused');
    });

    it('should keep working when the store fails', () => {
      const failing: TaskStore = {
        loadAll: () => [],
        save: vi.fn(() => {
          throw new Error('disk full');
        }),
        saveMany: vi.fn(),
        delete: vi.fn(() => {
          throw new Error('disk full');
        }),
      };
      const resilient = new TaskRegistry(failing);
      const task = makeTask();

      expect(() => resilient.put(task)).not.toThrow();
      expect(resilient.get(task.id)).toEqual(task);
      expect(resilient.remove(task.id)).toBe(true);
    });
  });

  describe('with SQLite', () => {
    let tempDir: string;
    let connection: DatabaseConnection;

    beforeEach(async () => {
      tempDir = await createTempDir('registry-test-');
      connection = new DatabaseConnection(join(tempDir, 'tasks.db'));
      await connection.initialize();
    });

    afterEach(async () => {
      connection.close();
      await removeDir(tempDir);
    });

    it('should survive a restart', () => {
      const registry = new TaskRegistry(new SqliteTaskStore(connection.getDatabase()));
      const paused = makeTask({ status: 'paused', downloaded: 300, totalSize: 1000 });
      const running = makeTask({ status: 'downloading', downloaded: 700, totalSize: 1000 });
      registry.put(paused);
      registry.put(running);
      registry.put({ ...running, downloaded: 800 }, { persist: false });

      const restarted = new TaskRegistry(new SqliteTaskStore(connection.getDatabase()));

      expect(restarted.load()).toBe(1);
      expect(restarted.list().map((task) => [task.id, task.status, task.downloaded])).toEqual([
        [paused.id, 'paused', 300],
        [running.id, 'paused', 700],
      ]);
    });
  });
});
