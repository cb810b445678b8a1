import type Database from 'better-sqlite3';
import type { DownloadTask } from '../models/task.js';
import { isTaskStatus } from '../models/task.js';
import type { TaskStore } from '../registry/types.js';
import { logger } from '../utils/logger.js';
import { DownloadTaskRow, TABLES } from './schema.js';

function rowToTask(row: DownloadTaskRow): DownloadTask | null {
  if (!isTaskStatus(row.status)) {
    logger().warn('Skipping stored task with unknown status', { id: row.id, status: row.status });
    return null;
  }

  return {
    id: row.id,
    url: row.url,
    name: row.name,
    path: row.path,
    totalSize: row.total_size,
    downloaded: row.downloaded,
    status: row.status,
    error: row.error,
    errorRetryable: row.error_retryable === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
  };
}

function taskToParams(task: DownloadTask): DownloadTaskRow {
  return {
    id: task.id,
    url: task.url,
    name: task.name,
    path: task.path,
    total_size: task.totalSize,
    downloaded: task.downloaded,
    status: task.status,
    error: task.error,
    error_retryable: task.errorRetryable ? 1 : 0,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
    completed_at: task.completedAt,
  };
}

export class SqliteTaskStore implements TaskStore {
  private readonly db: Database.Database;
  private readonly upsertStmt: Database.Statement<[DownloadTaskRow]>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly selectAllStmt: Database.Statement<[], DownloadTaskRow>;

  constructor(db: Database.Database) {
    this.db = db;
    // ON CONFLICT keeps the existing rowid, so creation order survives updates
    this.upsertStmt = db.prepare<[DownloadTaskRow]>(`
      INSERT INTO ${TABLES.download_tasks} (
        id, url, name, path, total_size, downloaded, status,
        error, error_retryable, created_at, updated_at, completed_at
      ) VALUES (
        @id, @url, @name, @path, @total_size, @downloaded, @status,
        @error, @error_retryable, @created_at, @updated_at, @completed_at
      )
      ON CONFLICT(id) DO UPDATE SET
        url = excluded.url,
        name = excluded.name,
        path = excluded.path,
        total_size = excluded.total_size,
        downloaded = excluded.downloaded,
        status = excluded.status,
        error = excluded.error,
        error_retryable = excluded.error_retryable,
        updated_at = excluded.updated_at,
        completed_at = excluded.completed_at
    `);
    this.deleteStmt = db.prepare<[string]>(`DELETE FROM ${TABLES.download_tasks} WHERE id = ?`);
    this.selectAllStmt = db.prepare<[], DownloadTaskRow>(
      `SELECT * FROM ${TABLES.download_tasks} ORDER BY rowid ASC`
    );
  }

  loadAll(): DownloadTask[] {
    const rows = this.selectAllStmt.all();
    const tasks: DownloadTask[] = [];
    for (const row of rows) {
      const task = rowToTask(row);
      if (task) {
        tasks.push(task);
      }
    }
    return tasks;
  }

  save(task: DownloadTask): void {
    this.upsertStmt.run(taskToParams(task));
  }

  saveMany(tasks: DownloadTask[]): void {
    const run = this.db.transaction((batch: DownloadTask[]) => {
      for (const task of batch) {
        this.upsertStmt.run(taskToParams(task));
      }
    });
    run(tasks);
  }

  delete(id: string): void {
    this.deleteStmt.run(id);
  }
}
