import type { DownloadTask } from '../models/task.js';

/**
 * Durable backing for the task registry. Implementations are synchronous so a
 * status change and its write happen in the same turn of the event loop.
 */
export interface TaskStore {
  // Every stored task, in creation order
  loadAll(): DownloadTask[];
  save(task: DownloadTask): void;
  saveMany(tasks: DownloadTask[]): void;
  delete(id: string): void;
}

export interface PutOptions {
  // false keeps the change in memory until the next flush
  persist?: boolean;
}
