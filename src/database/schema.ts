import { TASK_STATUSES } from '../models/task.js';

export const SCHEMA_VERSION = 1;

export const TABLES = {
  download_tasks: 'download_tasks',
  schema_version: 'schema_version',
} as const;

const STATUS_LIST = TASK_STATUSES.map((status) => `'${status}'`).join(', ');

export const CREATE_TABLES_SQL = `
-- Schema version table
CREATE TABLE IF NOT EXISTS ${TABLES.schema_version} (
  version INTEGER PRIMARY KEY,
  created_at TEXT DEFAULT CURRENT_TIMESTAMP
);

-- One row per download task; rowid order is creation order
CREATE TABLE IF NOT EXISTS ${TABLES.download_tasks} (
  id TEXT PRIMARY KEY,
  url TEXT NOT NULL,
  name TEXT NOT NULL,
  path TEXT NOT NULL,
  total_size INTEGER,
  downloaded INTEGER NOT NULL DEFAULT 0 CHECK (downloaded >= 0),
  status TEXT NOT NULL CHECK (status IN (${STATUS_LIST})),
  error TEXT,
  error_retryable INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  completed_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_download_tasks_status ON ${TABLES.download_tasks}(status);
CREATE INDEX IF NOT EXISTS idx_download_tasks_path ON ${TABLES.download_tasks}(path);
`;

export interface DownloadTaskRow {
  id: string;
  url: string;
  name: string;
  path: string;
  total_size: number | null;
  downloaded: number;
  status: string;
  error: string | null;
  error_retryable: number;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}
