import type { DownloadTask } from '../../src/models/task.js';

let counter = 0;

export function makeTask(overrides: Partial<DownloadTask> = {}): DownloadTask {
  counter += 1;
  return {
    id: `task-${counter}`,
    url: `http://127.0.0.1:9/file-${counter}.bin`,
    name: `file-${counter}.bin`,
    path: `/tmp/downloads/file-${counter}.bin`,
    totalSize: null,
    downloaded: 0,
    status: 'pending',
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    completedAt: null,
    error: null,
    errorRetryable: false,
    ...overrides,
  };
}
