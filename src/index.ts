export { ConfigManager, getConfig } from './config/index.js';
export type { Config, DownloadSettings, LogLevel } from './config/types.js';
export { DatabaseConnection } from './database/connection.js';
export { SqliteTaskStore } from './database/task-store.js';
export * from './errors/index.js';
export { NodeFetchTransferEngine, createTransferEngine } from './http/transfer-engine.js';
export * from './http/types.js';
export * from './models/task.js';
export { TaskRegistry } from './registry/task-registry.js';
export type { TaskStore, PutOptions } from './registry/types.js';
export * from './service/index.js';
export { formatBytes, formatSpeed, formatDuration } from './utils/format.js';
export { Logger, logger } from './utils/logger.js';
