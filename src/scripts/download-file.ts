#!/usr/bin/env tsx

import { DatabaseConnection } from '../database/connection.js';
import { createDownloadService } from '../service/index.js';
import { formatBytes, formatDuration, formatSpeed } from '../utils/format.js';
import { logger } from '../utils/logger.js';

const TERMINAL = new Set(['completed', 'paused', 'cancelled', 'failed']);

async function main() {
  const url = process.argv[2];
  const path = process.argv[3];

  if (!url) {
    console.error('Usage: npm run download-file <url> [path]');
    console.error('Example: npm run download-file https://example.com/archive.zip ./archive.zip');
    process.exit(1);
  }

  const service = await createDownloadService();

  try {
    const task = await service.createDownloadTask(url, undefined, path);
    logger().info('Downloading', { id: task.id, path: task.path });

    const finished = new Promise<string>((resolve) => {
      service.registerStatusCallback((snapshot, message) => {
        if (snapshot.id === task.id && TERMINAL.has(snapshot.status)) {
          resolve(message);
        }
      });
    });

    service.registerProgressCallback((snapshot) => {
      if (snapshot.id !== task.id) return;
      const speed = service.getDownloadSpeed(task.id);
      const eta = snapshot.totalSize !== null && speed > 0 ? (snapshot.totalSize - snapshot.downloaded) / speed : 0;
      process.stdout.write(
        `\rDownloading: ${snapshot.progress.toFixed(1)}% ${formatBytes(snapshot.downloaded)} / ${snapshot.totalText} ${formatSpeed(speed)} ETA ${formatDuration(eta)}   `
      );
    });

    // Ctrl+C pauses; running the same URL again later resumes from the partial file
    process.once('SIGINT', () => {
      service.pauseDownload(task.id).catch((error) => {
        logger().error('Pause failed', { error });
      });
    });

    service.startDownload(task.id);
    const message = await finished;
    process.stdout.write('\n');

    const final = service.getTaskById(task.id);
    if (final.status === 'failed') {
      logger().error(message, { path: final.path });
      process.exitCode = 1;
    } else {
      logger().info(message, { path: final.path, size: final.downloadedText });
    }
  } catch (error) {
    logger().error('Download failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  } finally {
    await service.shutdown();
    DatabaseConnection.getInstance().close();
  }
}

main().catch(console.error);
