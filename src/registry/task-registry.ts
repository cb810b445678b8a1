import type { DownloadTask } from '../models/task.js';
import { cloneTask } from '../models/task.js';
import { logger } from '../utils/logger.js';
import type { PutOptions, TaskStore } from './types.js';

/**
 * In-memory task table, optionally mirrored to a TaskStore.
 *
 * Only the download service writes here. Every read hands out a copy, so
 * callers never hold a reference into registry state. Store failures are
 * logged and the in-memory table stays authoritative for this process.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, DownloadTask>();
  private readonly dirty = new Set<string>();
  private readonly store?: TaskStore;

  constructor(store?: TaskStore) {
    this.store = store;
  }

  /**
   * Replace the in-memory table with the stored tasks. Tasks left
   * `downloading` by a previous process have no engine any more and are
   * reset to `paused`. Returns how many tasks were reset.
   */
  load(): number {
    if (!this.store) {
      return 0;
    }

    const stored = this.store.loadAll();
    this.tasks.clear();
    this.dirty.clear();

    const reconciled: DownloadTask[] = [];
    const now = new Date().toISOString();
    for (const task of stored) {
      if (task.status === 'downloading') {
        task.status = 'paused';
        task.updatedAt = now;
        reconciled.push(task);
      }
      this.tasks.set(task.id, task);
    }

    if (reconciled.length > 0) {
      this.writeMany(reconciled);
      logger().info('Reset interrupted downloads to paused', {
        count: reconciled.length,
        ids: reconciled.map((task) => task.id),
      });
    }

    logger().info('Task registry loaded', { count: this.tasks.size });
    return reconciled.length;
  }

  put(task: DownloadTask, options: PutOptions = {}): void {
    const copy = cloneTask(task);
    this.tasks.set(copy.id, copy);

    if (options.persist === false) {
      this.dirty.add(copy.id);
      return;
    }

    this.dirty.delete(copy.id);
    this.write(copy);
  }

  get(id: string): DownloadTask | undefined {
    const task = this.tasks.get(id);
    return task ? cloneTask(task) : undefined;
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  // Insertion order
  list(): DownloadTask[] {
    return Array.from(this.tasks.values(), cloneTask);
  }

  size(): number {
    return this.tasks.size;
  }

  remove(id: string): boolean {
    const existed = this.tasks.delete(id);
    this.dirty.delete(id);
    if (existed && this.store) {
      try {
        this.store.delete(id);
      } catch (error) {
        logger().error('Failed to delete stored task', { id, error });
      }
    }
    return existed;
  }

  /**
   * Write pending in-memory changes; all of them when no id is given
   */
  flush(id?: string): void {
    const ids = id === undefined ? Array.from(this.dirty) : this.dirty.has(id) ? [id] : [];
    const pending: DownloadTask[] = [];
    for (const pendingId of ids) {
      this.dirty.delete(pendingId);
      const task = this.tasks.get(pendingId);
      if (task) {
        pending.push(task);
      }
    }
    if (pending.length > 0) {
      this.writeMany(pending);
    }
  }

  private write(task: DownloadTask): void {
    if (!this.store) return;
    try {
      this.store.save(task);
    } catch (error) {
      logger().error('Failed to persist task', { id: task.id, error });
    }
  }

  private writeMany(tasks: DownloadTask[]): void {
    if (!this.store) return;
    try {
      this.store.saveMany(tasks);
    } catch (error) {
      logger().error('Failed to persist tasks', { count: tasks.length, error });
    }
  }
}
