import { ConfigManager } from '../config/index.js';
import { DatabaseConnection } from '../database/connection.js';
import { SqliteTaskStore } from '../database/task-store.js';
import { createTransferEngine } from '../http/transfer-engine.js';
import { TaskRegistry } from '../registry/task-registry.js';
import { logger } from '../utils/logger.js';
import { DownloadService } from './download-service.js';

export * from './download-service.js';
export { SpeedTracker } from './speed-tracker.js';

/**
 * Wire a DownloadService from the configuration: SQLite-backed registry,
 * node-fetch engine, configured download directory. Interrupted downloads
 * from a previous run come back as paused.
 */
export async function createDownloadService(connection: DatabaseConnection = DatabaseConnection.getInstance()): Promise<DownloadService> {
  const config = ConfigManager.getInstance().getConfig();
  const settings = config.downloads;

  await connection.initialize();
  const registry = new TaskRegistry(new SqliteTaskStore(connection.getDatabase()));

  const service = new DownloadService({
    registry,
    engine: createTransferEngine({
      chunkSize: settings.chunkSize,
      timeout: settings.timeout,
      headers: { 'User-Agent': settings.userAgent },
    }),
    downloadDir: settings.directory,
    speedWindow: settings.speedWindow,
    persistInterval: settings.persistInterval,
  });

  const reconciled = service.initialize();
  logger().info('Download service ready', {
    tasks: service.getAllTasks().length,
    reconciled,
    downloadDir: service.getDownloadDirectory(),
  });
  return service;
}
