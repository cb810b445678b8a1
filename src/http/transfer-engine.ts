import fetch, { Response } from 'node-fetch';
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { dirname } from 'path';
import {
  InterruptReason,
  TransferEngine,
  TransferEngineOptions,
  TransferListener,
  TransferOutcome,
  TransferRequest,
  TransferSignal,
} from './types.js';
import { DiskError, NetworkError, TransferError } from '../errors/index.js';
import { logger, describeError } from '../utils/logger.js';
import { ensureDir, getFileSize, isErrnoException } from '../utils/filesystem.js';

// The destination itself refuses writes; retrying cannot help
const NON_RETRYABLE_DISK_CODES = new Set(['EACCES', 'EPERM', 'EROFS', 'EISDIR', 'ENOTDIR']);

const CONTENT_RANGE = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i;

interface RangeInfo {
  start: number;
  total: number | null;
}

interface Negotiated {
  offset: number;
  total: number | null;
}

export function parseContentRange(header: string | null): RangeInfo | null {
  if (!header) return null;
  const match = CONTENT_RANGE.exec(header.trim());
  if (!match) return null;
  return {
    start: parseInt(match[1], 10),
    total: match[3] === '*' ? null : parseInt(match[3], 10),
  };
}

function parseContentLength(header: string | null): number | null {
  if (!header) return null;
  const value = parseInt(header, 10);
  return Number.isFinite(value) && value >= 0 ? value : null;
}

function toDiskError(error: unknown, path: string): DiskError {
  const code = isErrnoException(error) ? error.code : undefined;
  const retryable = code === undefined || !NON_RETRYABLE_DISK_CODES.has(code);
  const message = retryable
    ? `Disk write failed for ${path}: ${describeError(error)}`
    : `Destination not writable: ${path} (${describeError(error)})`;
  return new DiskError(message, { retryable, cause: error });
}

function interrupted(reason: InterruptReason, downloaded: number, totalSize: number | null): TransferOutcome {
  return {
    status: reason === 'pause' ? 'paused' : 'cancelled',
    downloaded,
    totalSize,
  };
}

/**
 * Single-connection HTTP(S) transfer with byte-range resume.
 *
 * The partial file's length is the resume offset. A server that answers a
 * range request with the full entity (200, or a 206 starting at 0) gets the
 * partial file truncated and the transfer restarts from byte 0.
 */
export class NodeFetchTransferEngine implements TransferEngine {
  private readonly options: TransferEngineOptions;

  constructor(options: TransferEngineOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    this.options = options;
  }

  async run(request: TransferRequest, listener: TransferListener, signal: TransferSignal): Promise<TransferOutcome> {
    const { path } = request;
    const url = this.parseUrl(request.url);

    // Ensure output directory exists
    try {
      await ensureDir(dirname(path));
    } catch (error) {
      throw toDiskError(error, path);
    }

    // Resume from whatever is already on disk
    let resumeFrom = 0;
    if (!request.fresh) {
      try {
        resumeFrom = await getFileSize(path);
      } catch (error) {
        throw toDiskError(error, path);
      }
    }

    if (signal.reason) {
      return interrupted(signal.reason, resumeFrom, null);
    }

    logger().info('Starting transfer', { url: url.href, path, resumeFrom });

    let response = await this.fetchWithTimeout(url, resumeFrom, signal);
    if (!response) {
      return interrupted(signal.reason ?? 'cancel', resumeFrom, null);
    }

    // Partial file at or past the end: start over once
    let restarted = false;
    if (resumeFrom > 0 && response.status === 416) {
      logger().warn('Range not satisfiable, restarting from the beginning', { url: url.href, resumeFrom });
      await response.arrayBuffer();
      resumeFrom = 0;
      restarted = true;
      response = await this.fetchWithTimeout(url, 0, signal);
      if (!response) {
        return interrupted(signal.reason ?? 'cancel', 0, null);
      }
    }

    if (!response.ok) {
      // Drain the error body so the socket is released
      await response.arrayBuffer().catch((error: unknown) => {
        logger().debug('Discarding error response body failed', { url: url.href, error: describeError(error) });
      });
      throw new NetworkError(`HTTP ${response.status}: ${response.statusText}`, { status: response.status });
    }

    const negotiated = this.negotiate(response, resumeFrom);
    if (negotiated.offset !== resumeFrom) {
      logger().warn('Server ignored range request, restarting from the beginning', {
        url: url.href,
        status: response.status,
        requested: resumeFrom,
      });
      restarted = true;
    }

    // Report where the body starts, then write it out
    listener.onStart({ resumeFrom: negotiated.offset, totalSize: negotiated.total, restarted });

    return this.stream(response, path, negotiated, listener, signal);
  }

  private parseUrl(raw: string): URL {
    let url: URL;
    try {
      url = new URL(raw);
    } catch (error) {
      throw new NetworkError(`Invalid URL: ${raw}`, { retryable: false, cause: error });
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new NetworkError(`Unsupported protocol: ${url.protocol}`, { retryable: false });
    }
    return url;
  }

  /**
   * Decide where the body starts relative to the file on disk
   */
  private negotiate(response: Response, requested: number): Negotiated {
    const length = parseContentLength(response.headers.get('content-length'));

    if (response.status === 206) {
      const range = parseContentRange(response.headers.get('content-range'));
      const start = range ? range.start : requested;
      if (start !== requested && start !== 0) {
        throw new NetworkError(`Server returned range starting at ${start}, expected ${requested}`);
      }
      const total = range?.total ?? (length !== null ? length + start : null);
      return { offset: start, total };
    }

    return { offset: 0, total: length };
  }

  private async stream(
    response: Response,
    path: string,
    negotiated: Negotiated,
    listener: TransferListener,
    signal: TransferSignal
  ): Promise<TransferOutcome> {
    const { chunkSize } = this.options;
    const total = negotiated.total;
    let downloaded = negotiated.offset;

    const body = response.body;
    if (!body) {
      throw new NetworkError('Response body missing');
    }

    let handle: FileHandle;
    try {
      handle = await fs.open(path, negotiated.offset > 0 ? 'a' : 'w');
    } catch (error) {
      throw toDiskError(error, path);
    }

    try {
      for await (const received of body) {
        const chunk = typeof received === 'string' ? Buffer.from(received) : received;

        for (let start = 0; start < chunk.length; start += chunkSize) {
          if (signal.reason) {
            logger().info('Transfer interrupted', { path, reason: signal.reason, downloaded });
            return interrupted(signal.reason, downloaded, total);
          }

          const slice = chunk.subarray(start, start + chunkSize);
          if (total !== null && downloaded + slice.length > total) {
            throw new NetworkError(`Server sent more than the declared ${total} bytes`);
          }

          try {
            await handle.write(slice);
          } catch (error) {
            throw toDiskError(error, path);
          }

          downloaded += slice.length;
          listener.onProgress(slice.length, total);
        }
      }
    } catch (error) {
      if (signal.reason) {
        logger().info('Transfer interrupted', { path, reason: signal.reason, downloaded });
        return interrupted(signal.reason, downloaded, total);
      }
      if (error instanceof TransferError) {
        throw error;
      }
      throw new NetworkError(`Connection lost: ${describeError(error)}`, { cause: error });
    } finally {
      await handle.close();
    }

    if (total !== null && downloaded < total) {
      throw new NetworkError(`Connection closed after ${downloaded} of ${total} bytes`);
    }

    logger().info('Transfer completed', { path, downloaded });
    return { status: 'completed', downloaded, totalSize: total ?? downloaded };
  }

  /**
   * Resolves null when the signal interrupted the request before headers arrived
   */
  private async fetchWithTimeout(url: URL, offset: number, signal: TransferSignal): Promise<Response | null> {
    // Create abort controller for the connect timeout
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeout);

    // The request must also die if the transfer is interrupted mid-body
    const onInterrupt = (): void => controller.abort();
    signal.abortSignal.addEventListener('abort', onInterrupt, { once: true });
    if (signal.aborted) {
      controller.abort();
    }

    const headers: Record<string, string> = { ...this.options.headers };
    if (offset > 0) {
      headers['Range'] = `bytes=${offset}-`;
    }

    try {
      return await fetch(url, {
        headers,
        signal: controller.signal,
        // Bytes on disk must match the entity the ranges refer to
        compress: false,
      });
    } catch (error) {
      signal.abortSignal.removeEventListener('abort', onInterrupt);
      if (signal.reason) {
        return null;
      }
      if (timedOut) {
        throw new NetworkError(`Connection timeout after ${this.options.timeout}ms`, { cause: error });
      }
      throw new NetworkError(`Request failed: ${describeError(error)}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function createTransferEngine(options: TransferEngineOptions): TransferEngine {
  return new NodeFetchTransferEngine(options);
}
