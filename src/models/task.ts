import { formatBytes } from '../utils/format.js';

export const TASK_STATUSES = [
  'pending',
  'downloading',
  'paused',
  'completed',
  'cancelled',
  'failed',
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const ACTIVE_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>(['pending', 'downloading']);

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

/**
 * Durable record of one download. Timestamps are ISO-8601 strings.
 */
export interface DownloadTask {
  id: string;
  url: string;
  name: string;
  path: string;
  // null until the server declares a length (or the transfer completes)
  totalSize: number | null;
  downloaded: number;
  status: TaskStatus;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
  error: string | null;
  errorRetryable: boolean;
}

export interface TaskSnapshot extends Readonly<DownloadTask> {
  // 0-100, 0 when the total is unknown
  readonly progress: number;
  readonly downloadedText: string;
  readonly totalText: string;
  readonly statusText: string;
  readonly active: boolean;
  readonly canResume: boolean;
  readonly canRetry: boolean;
}

const STATUS_TEXT: Record<TaskStatus, string> = {
  pending: 'Waiting',
  downloading: 'Downloading',
  paused: 'Paused',
  completed: 'Completed',
  cancelled: 'Cancelled',
  failed: 'Failed',
};

export function statusText(status: TaskStatus): string {
  return STATUS_TEXT[status];
}

export function progressPercent(downloaded: number, total: number | null): number {
  if (total === null || total <= 0) return 0;
  return Math.min(100, Math.round((downloaded / total) * 10000) / 100);
}

export function cloneTask(task: DownloadTask): DownloadTask {
  return { ...task };
}

/**
 * Immutable view handed to observers and callers
 */
export function toSnapshot(task: DownloadTask): TaskSnapshot {
  return Object.freeze({
    ...task,
    progress: progressPercent(task.downloaded, task.totalSize),
    downloadedText: formatBytes(task.downloaded),
    totalText: task.totalSize === null ? 'Unknown' : formatBytes(task.totalSize),
    statusText: statusText(task.status),
    active: ACTIVE_STATUSES.has(task.status),
    canResume: task.status === 'paused',
    canRetry: task.status === 'failed' && task.errorRetryable,
  });
}
