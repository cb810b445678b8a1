import { randomUUID } from 'crypto';
import { join, resolve } from 'path';
import {
  ACTIVE_STATUSES,
  DownloadTask,
  TaskSnapshot,
  TaskStatus,
  toSnapshot,
} from '../models/task.js';
import { TaskRegistry } from '../registry/task-registry.js';
import {
  TransferEngine,
  TransferListener,
  TransferOutcome,
  TransferSignal,
  TransferStart,
} from '../http/types.js';
import {
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  TransferError,
} from '../errors/index.js';
import { SpeedTracker } from './speed-tracker.js';
import { logger, describeError } from '../utils/logger.js';
import {
  ensureWritableDir,
  ensureWritableFile,
  getFileSize,
  isDirectory,
  removeFile,
} from '../utils/filesystem.js';
import { fallbackFileName, fileNameFromUrl } from '../utils/paths.js';

export type ProgressCallback = (task: TaskSnapshot) => void | Promise<void>;
export type StatusCallback = (task: TaskSnapshot, message: string) => void | Promise<void>;

export interface DownloadServiceOptions {
  registry: TaskRegistry;
  engine: TransferEngine;
  // Destination directory for tasks created without a path
  downloadDir: string;
  // Rolling window for getDownloadSpeed (ms)
  speedWindow?: number;
  // Minimum delay between durable progress writes for one task (ms)
  persistInterval?: number;
  now?: () => number;
}

export interface DeleteResult {
  id: string;
  fileDeleted: boolean;
  fileError?: string;
}

export interface DownloadStatus {
  status: TaskStatus;
  progress: number;
  downloaded: number;
  totalSize: number | null;
  // bytes per second
  speed: number;
  active: boolean;
}

interface ActiveTransfer {
  signal: TransferSignal;
  done: Promise<void>;
}

export const STATUS_MESSAGES = {
  created: 'Task created',
  started: 'Download started',
  resumed: 'Download resumed',
  paused: 'Download paused',
  completed: 'Download completed',
  cancelled: 'Download cancelled',
  retry: 'Task queued for retry',
  deleted: 'Task deleted',
} as const;

/**
 * Facade over the task registry and the transfer engines.
 *
 * It is the registry's only writer. Engines never touch a task; they report
 * through a TransferListener and the service applies the change, persists it
 * and fans it out to observers. One engine runs per `downloading` task.
 */
export class DownloadService {
  private readonly registry: TaskRegistry;
  private readonly engine: TransferEngine;
  private readonly speed: SpeedTracker;
  private readonly persistInterval: number;
  private readonly now: () => number;
  private downloadDir: string;

  private readonly active = new Map<string, ActiveTransfer>();
  private readonly lastPersist = new Map<string, number>();
  private readonly progressCallbacks: ProgressCallback[] = [];
  private readonly statusCallbacks: StatusCallback[] = [];

  constructor(options: DownloadServiceOptions) {
    this.registry = options.registry;
    this.engine = options.engine;
    this.downloadDir = resolve(options.downloadDir);
    this.now = options.now ?? Date.now;
    this.speed = new SpeedTracker(options.speedWindow ?? 3000, this.now);
    this.persistInterval = options.persistInterval ?? 500;
  }

  /**
   * Load persisted tasks. Returns how many interrupted downloads were reset to paused.
   */
  initialize(): number {
    return this.registry.load();
  }

  async createDownloadTask(url: string, name?: string, path?: string): Promise<TaskSnapshot> {
    const trimmed = url.trim();
    if (!trimmed) {
      throw new InvalidArgumentError('Download URL must not be empty');
    }

    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch (error) {
      throw new InvalidArgumentError(`Invalid download URL: ${trimmed}`, { cause: error });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new InvalidArgumentError(`Unsupported URL protocol: ${parsed.protocol}`);
    }

    const fileName = fileNameFromUrl(parsed) || fallbackFileName(this.now());
    const destination = resolve(path?.trim() ? path.trim() : join(this.downloadDir, fileName));

    if (await isDirectory(destination)) {
      throw new InvalidArgumentError(`Destination is a directory: ${destination}`);
    }
    try {
      await ensureWritableFile(destination);
    } catch (error) {
      throw new InvalidArgumentError(`Destination not writable: ${destination}`, { cause: error });
    }

    const timestamp = this.timestamp();
    const task: DownloadTask = {
      id: randomUUID(),
      url: parsed.href,
      name: name?.trim() || fileName,
      path: destination,
      totalSize: null,
      downloaded: 0,
      status: 'pending',
      createdAt: timestamp,
      updatedAt: timestamp,
      completedAt: null,
      error: null,
      errorRetryable: false,
    };

    this.registry.put(task);
    logger().info('Download task created', { id: task.id, url: task.url, path: task.path });
    this.notifyStatus(task, STATUS_MESSAGES.created);
    return toSnapshot(task);
  }

  /**
   * Spawn the engine and return without waiting for the transfer
   */
  startDownload(id: string): void {
    const task = this.require(id);

    if (task.status === 'downloading' || task.status === 'completed') {
      logger().debug('Start ignored', { id, status: task.status });
      return;
    }
    if (task.status === 'cancelled') {
      throw new InvalidStateError(`Task ${id} was cancelled; create a new task to download again`);
    }
    if (task.status === 'failed') {
      throw new InvalidStateError(`Task ${id} failed; call retryDownload before starting it again`);
    }

    // One writer per destination file
    const holder = this.registry
      .list()
      .find((other) => other.id !== id && other.path === task.path && other.status === 'downloading');
    if (holder) {
      throw new InvalidStateError(`Destination ${task.path} is already being written by task ${holder.id}`);
    }

    // Mark downloading and persist before the engine runs
    const message = task.status === 'paused' ? STATUS_MESSAGES.resumed : STATUS_MESSAGES.started;
    task.status = 'downloading';
    task.error = null;
    task.errorRetryable = false;
    task.updatedAt = this.timestamp();
    this.registry.put(task);
    this.speed.reset(id);
    this.lastPersist.delete(id);

    // The engine starts on the next microtask so observers see `downloading` first
    const signal = new TransferSignal();
    const done = Promise.resolve().then(() => this.runTransfer(task, signal));
    this.active.set(id, { signal, done });

    logger().info('Download started', { id, url: task.url, path: task.path });
    this.notifyStatus(task, message);
  }

  /**
   * Resolves once the engine has released the connection and the file
   */
  async pauseDownload(id: string): Promise<void> {
    const task = this.require(id);
    const transfer = this.active.get(id);
    if (task.status !== 'downloading' || !transfer) {
      logger().debug('Pause ignored', { id, status: task.status });
      return;
    }

    transfer.signal.interrupt('pause');
    await transfer.done;
  }

  resumeDownload(id: string): void {
    this.startDownload(id);
  }

  /**
   * Stops the engine if one runs. The destination file is left in place.
   */
  async cancelDownload(id: string): Promise<void> {
    const task = this.require(id);
    if (task.status === 'completed' || task.status === 'cancelled') {
      logger().debug('Cancel ignored', { id, status: task.status });
      return;
    }

    const transfer = this.active.get(id);
    if (transfer) {
      transfer.signal.interrupt('cancel');
      await transfer.done;
    }

    // A pause may have won the race for the signal, or the task was removed meanwhile
    const current = this.registry.get(id);
    if (!current || current.status === 'completed' || current.status === 'cancelled') {
      return;
    }
    if (this.active.has(id)) {
      return this.cancelDownload(id);
    }

    current.status = 'cancelled';
    current.updatedAt = this.timestamp();
    this.registry.put(current);
    logger().info('Download cancelled', { id });
    this.notifyStatus(current, STATUS_MESSAGES.cancelled);
  }

  /**
   * Move a failed task back to pending. The downloaded counter is re-read
   * from the partial file on disk.
   */
  async retryDownload(id: string): Promise<TaskSnapshot> {
    const task = this.require(id);
    this.assertRetryable(task);

    // Check the partial file on disk
    let onDisk = 0;
    try {
      onDisk = await getFileSize(task.path);
    } catch (error) {
      logger().warn('Could not read partial file, retrying from the beginning', {
        id,
        path: task.path,
        error: describeError(error),
      });
    }

    const current = this.require(id);
    this.assertRetryable(current);

    current.downloaded = current.totalSize !== null && onDisk > current.totalSize ? 0 : onDisk;
    current.status = 'pending';
    current.error = null;
    current.errorRetryable = false;
    current.completedAt = null;
    current.updatedAt = this.timestamp();
    this.registry.put(current);

    logger().info('Download queued for retry', { id, downloaded: current.downloaded });
    this.notifyStatus(current, STATUS_MESSAGES.retry);
    return toSnapshot(current);
  }

  /**
   * Remove the task, cancelling it first when it is running. A failure to
   * delete the file is reported in the result; the task is removed anyway.
   */
  async deleteTask(id: string, deleteFile = false): Promise<DeleteResult> {
    this.require(id);

    if (this.active.has(id)) {
      await this.cancelDownload(id);
    }

    const task = this.registry.get(id);
    if (!task) {
      throw new NotFoundError(id);
    }
    this.registry.remove(id);

    // Remove the downloaded file if requested
    const result: DeleteResult = { id, fileDeleted: false };
    if (deleteFile) {
      try {
        result.fileDeleted = await removeFile(task.path);
      } catch (error) {
        result.fileError = describeError(error);
        logger().error('Failed to delete downloaded file', { id, path: task.path, error: result.fileError });
      }
    }

    logger().info('Download task deleted', { id, fileDeleted: result.fileDeleted });
    this.notifyStatus(task, STATUS_MESSAGES.deleted);
    return result;
  }

  getAllTasks(): TaskSnapshot[] {
    return this.registry.list().map(toSnapshot);
  }

  getActiveTasks(): TaskSnapshot[] {
    return this.registry
      .list()
      .filter((task) => ACTIVE_STATUSES.has(task.status))
      .map(toSnapshot);
  }

  getTaskById(id: string): TaskSnapshot {
    return toSnapshot(this.require(id));
  }

  /**
   * Bytes per second over the recent window; 0 unless the task is downloading
   */
  getDownloadSpeed(id: string): number {
    const task = this.require(id);
    if (task.status !== 'downloading') {
      return 0;
    }
    return this.speed.speed(id);
  }

  getDownloadStatus(id: string): DownloadStatus {
    const snapshot = this.getTaskById(id);
    return {
      status: snapshot.status,
      progress: snapshot.progress,
      downloaded: snapshot.downloaded,
      totalSize: snapshot.totalSize,
      speed: this.getDownloadSpeed(id),
      active: this.active.has(id),
    };
  }

  getDownloadDirectory(): string {
    return this.downloadDir;
  }

  /**
   * Applies to tasks created afterwards
   */
  async setDownloadDirectory(directory: string): Promise<void> {
    const target = resolve(directory);
    try {
      await ensureWritableDir(target);
    } catch (error) {
      throw new InvalidArgumentError(`Cannot use download directory: ${target}`, { cause: error });
    }
    this.downloadDir = target;
    logger().info('Default download directory set', { directory: target });
  }

  registerProgressCallback(callback: ProgressCallback): () => void {
    this.progressCallbacks.push(callback);
    return () => removeFromList(this.progressCallbacks, callback);
  }

  registerStatusCallback(callback: StatusCallback): () => void {
    this.statusCallbacks.push(callback);
    return () => removeFromList(this.statusCallbacks, callback);
  }

  /**
   * Pause every running transfer, wait for the engines to finish and flush the registry
   */
  async shutdown(): Promise<void> {
    const running = Array.from(this.active.values());
    for (const transfer of running) {
      transfer.signal.interrupt('pause');
    }
    await Promise.all(running.map((transfer) => transfer.done));
    this.registry.flush();
    logger().info('Download service stopped', { paused: running.length });
  }

  private async runTransfer(task: DownloadTask, signal: TransferSignal): Promise<void> {
    const id = task.id;
    const listener: TransferListener = {
      onStart: (info) => this.handleStart(id, info),
      onProgress: (delta, totalSize) => this.handleProgress(id, delta, totalSize),
    };

    let outcome: TransferOutcome | null = null;
    let failure: unknown = null;
    try {
      outcome = await this.engine.run({ url: task.url, path: task.path }, listener, signal);
    } catch (error) {
      failure = error;
    }

    // Release the slot before recording the result
    this.active.delete(id);
    this.speed.reset(id);
    this.lastPersist.delete(id);

    const current = this.registry.get(id);
    if (!current) {
      logger().warn('Transfer finished for a task that no longer exists', { id });
      return;
    }

    if (outcome) {
      this.applyOutcome(current, outcome);
    } else if (signal.reason) {
      // Failing while being stopped still counts as stopped
      this.applyOutcome(current, {
        status: signal.reason === 'pause' ? 'paused' : 'cancelled',
        downloaded: current.downloaded,
        totalSize: current.totalSize,
      });
    } else {
      this.applyFailure(current, failure);
    }
  }

  private handleStart(id: string, info: TransferStart): void {
    const task = this.registry.get(id);
    if (!task) return;

    task.downloaded = info.resumeFrom;
    task.totalSize = info.totalSize;
    task.updatedAt = this.timestamp();
    this.registry.put(task);
    this.lastPersist.set(id, this.now());
    this.speed.record(id, task.downloaded);

    logger().info('Transfer negotiated', {
      id,
      resumeFrom: info.resumeFrom,
      totalSize: info.totalSize,
      restarted: info.restarted,
    });
  }

  private handleProgress(id: string, delta: number, totalSize: number | null): void {
    const task = this.registry.get(id);
    if (!task) return;

    task.downloaded += delta;
    task.totalSize = totalSize;
    task.updatedAt = this.timestamp();

    const now = this.now();
    const last = this.lastPersist.get(id);
    const persist = last === undefined || now - last >= this.persistInterval;
    this.registry.put(task, { persist });
    if (persist) {
      this.lastPersist.set(id, now);
    }

    this.speed.record(id, task.downloaded);
    this.notifyProgress(task);
  }

  private applyOutcome(task: DownloadTask, outcome: TransferOutcome): void {
    task.downloaded = outcome.downloaded;
    // An interrupt before the response arrives carries no total
    task.totalSize = outcome.totalSize ?? task.totalSize;
    task.updatedAt = this.timestamp();

    let message: string;
    if (outcome.status === 'completed') {
      task.status = 'completed';
      task.completedAt = task.updatedAt;
      message = STATUS_MESSAGES.completed;
    } else if (outcome.status === 'paused') {
      task.status = 'paused';
      message = STATUS_MESSAGES.paused;
    } else {
      task.status = 'cancelled';
      message = STATUS_MESSAGES.cancelled;
    }

    this.registry.put(task);
    logger().info(message, { id: task.id, downloaded: task.downloaded, totalSize: task.totalSize });
    this.notifyStatus(task, message);
  }

  private applyFailure(task: DownloadTask, failure: unknown): void {
    const detail = describeError(failure);
    task.status = 'failed';
    task.error = detail;
    // Anything that is not a classified transfer error is assumed transient
    task.errorRetryable = failure instanceof TransferError ? failure.retryable : true;
    task.updatedAt = this.timestamp();
    this.registry.put(task);

    logger().error('Download failed', {
      id: task.id,
      url: task.url,
      error: detail,
      retryable: task.errorRetryable,
    });
    this.notifyStatus(task, `Download failed: ${detail}`);
  }

  private notifyProgress(task: DownloadTask): void {
    const snapshot = toSnapshot(task);
    for (const callback of [...this.progressCallbacks]) {
      this.invoke('progress', snapshot.id, () => callback(snapshot));
    }
  }

  private notifyStatus(task: DownloadTask, message: string): void {
    const snapshot = toSnapshot(task);
    for (const callback of [...this.statusCallbacks]) {
      this.invoke('status', snapshot.id, () => callback(snapshot, message));
    }
  }

  /**
   * Observer failures, sync or async, are logged and go no further
   */
  private invoke(kind: 'progress' | 'status', id: string, call: () => void | Promise<void>): void {
    const onError = (error: unknown): void => {
      logger().error(`${kind} callback failed`, { id, error: describeError(error) });
    };

    try {
      const result = call();
      if (result instanceof Promise) {
        void result.catch(onError);
      }
    } catch (error) {
      onError(error);
    }
  }

  private assertRetryable(task: DownloadTask): void {
    if (task.status !== 'failed') {
      throw new InvalidStateError(`Only failed tasks can be retried; task ${task.id} is ${task.status}`);
    }
    if (!task.errorRetryable) {
      throw new InvalidStateError(`Task ${task.id} cannot be retried: ${task.error ?? 'unknown error'}`);
    }
  }

  private require(id: string): DownloadTask {
    const task = this.registry.get(id);
    if (!task) {
      throw new NotFoundError(id);
    }
    return task;
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

function removeFromList<T>(list: T[], item: T): void {
  const index = list.indexOf(item);
  if (index !== -1) {
    list.splice(index, 1);
  }
}
