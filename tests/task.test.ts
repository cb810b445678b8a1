import { describe, it, expect } from 'vitest';
import { isTaskStatus, progressPercent, statusText, toSnapshot } from '../src/models/task.js';
import { formatBytes, formatDuration, formatSpeed } from '../src/utils/format.js';
import { fallbackFileName, fileNameFromUrl, sanitizeFileName } from '../src/utils/paths.js';
import { makeTask } from './helpers/tasks.js';

describe('Task model', () => {
  it('should compute progress as a capped percentage', () => {
    expect(progressPercent(0, 10000)).toBe(0);
    expect(progressPercent(3000, 10000)).toBe(30);
    expect(progressPercent(1, 3)).toBe(33.33);
    expect(progressPercent(12000, 10000)).toBe(100);
  });

  it('should report 0 progress when the total is unknown', () => {
    expect(progressPercent(5000, null)).toBe(0);
    expect(progressPercent(5000, 0)).toBe(0);
  });

  it('should recognise statuses', () => {
    expect(isTaskStatus('paused')).toBe(true);
    expect(isTaskStatus('stopped')).toBe(false);
    expect(statusText('pending')).toBe('Waiting');
    expect(statusText('downloading')).toBe('Downloading');
  });

  it('should build a frozen snapshot with derived fields', () => {
    const snapshot = toSnapshot(
      makeTask({ status: 'failed', downloaded: 1536, totalSize: 3072, error: 'HTTP 503: Service Unavailable', errorRetryable: true })
    );

    expect(snapshot).toMatchObject({
      progress: 50,
      downloadedText: '1.5 KB',
      totalText: '3 KB',
      statusText: 'Failed',
      active: false,
      canResume: false,
      canRetry: true,
    });
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('should mark pending and downloading tasks active', () => {
    expect(toSnapshot(makeTask({ status: 'pending' })).active).toBe(true);
    expect(toSnapshot(makeTask({ status: 'downloading' })).active).toBe(true);
    expect(toSnapshot(makeTask({ status: 'paused' }))).toMatchObject({ active: false, canResume: true });
    expect(toSnapshot(makeTask({ totalSize: null })).totalText).toBe('Unknown');
  });
});

describe('format', () => {
  it('should format byte counts', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1024)).toBe('1 KB');
    expect(formatBytes(1572864)).toBe('1.5 MB');
    expect(formatBytes(Math.pow(1024, 5))).toBe('1024 TB');
  });

  it('should format speeds', () => {
    expect(formatSpeed(2048)).toBe('2 KB/s');
    expect(formatSpeed(0)).toBe('0 B/s');
  });

  it('should format durations', () => {
    expect(formatDuration(0)).toBe('--');
    expect(formatDuration(42)).toBe('42s');
    expect(formatDuration(125)).toBe('2m 5s');
    expect(formatDuration(3 * 3600 + 15 * 60)).toBe('3h 15m');
  });
});

describe('paths', () => {
  it('should take the last URL segment as the file name', () => {
    expect(fileNameFromUrl(new URL('http://example.com/files/archive.tar.gz?x=1'))).toBe('archive.tar.gz');
    expect(fileNameFromUrl(new URL('http://example.com/a/my%20file.txt'))).toBe('my file.txt');
  });

  it('should return an empty name when the URL has no usable segment', () => {
    expect(fileNameFromUrl(new URL('http://example.com/'))).toBe('');
    expect(fileNameFromUrl(new URL('http://example.com/..'))).toBe('');
  });

  it('should replace characters that are not allowed in file names', () => {
    expect(sanitizeFileName('a:b*c?.txt')).toBe('a_b_c_.txt');
    expect(fileNameFromUrl(new URL('http://example.com/dir/a%2Fb.bin'))).toBe('a_b.bin');
  });

  it('should build a timestamped fallback name', () => {
    expect(fallbackFileName(1700000000000)).toBe('download_1700000000000');
  });
});
