export type DownloadErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'NETWORK_ERROR'
  | 'DISK_ERROR';

export class DownloadError extends Error {
  public readonly code: DownloadErrorCode;

  constructor(code: DownloadErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad URL, unwritable destination or similar caller mistake; nothing was registered */
export class InvalidArgumentError extends DownloadError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_ARGUMENT', message, options);
  }
}

export class NotFoundError extends DownloadError {
  public readonly taskId: string;

  constructor(taskId: string) {
    super('NOT_FOUND', `Task not found: ${taskId}`);
    this.taskId = taskId;
  }
}

/** The operation is not allowed from the task's current status */
export class InvalidStateError extends DownloadError {
  constructor(message: string) {
    super('INVALID_STATE', message);
  }
}

/**
 * Raised by a transfer engine. `retryable` is false when trying again
 * against the same URL and destination cannot succeed.
 */
export abstract class TransferError extends DownloadError {
  public readonly retryable: boolean;

  protected constructor(
    code: 'NETWORK_ERROR' | 'DISK_ERROR',
    message: string,
    retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(code, message, options);
    this.retryable = retryable;
  }
}

export class NetworkError extends TransferError {
  public readonly status?: number;

  constructor(message: string, options: { retryable?: boolean; status?: number; cause?: unknown } = {}) {
    super('NETWORK_ERROR', message, options.retryable ?? true, { cause: options.cause });
    this.status = options.status;
  }
}

export class DiskError extends TransferError {
  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super('DISK_ERROR', message, options.retryable ?? true, { cause: options.cause });
  }
}

export function isDownloadError(error: unknown): error is DownloadError {
  return error instanceof DownloadError;
}
