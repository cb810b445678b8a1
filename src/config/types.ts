export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface DownloadSettings {
  // Default destination directory for tasks created without a path
  directory: string;
  // Largest slice written between two interruption checks (bytes)
  chunkSize: number;
  // Connect timeout (ms)
  timeout: number;
  // Rolling window used for speed computation (ms)
  speedWindow: number;
  // Minimum delay between two durable progress writes for one task (ms)
  persistInterval: number;
  userAgent: string;
}

export interface Config {
  // MCP server identity
  server: {
    name: string;
    version: string;
  };

  // Database settings
  database: {
    path: string;
    options: {
      verbose?: (message?: unknown, ...additionalArgs: unknown[]) => void;
      readonly?: boolean;
      fileMustExist?: boolean;
    };
  };

  downloads: DownloadSettings;

  // File paths
  paths: {
    dataDir: string;
    downloadsDir: string;
    databaseFile: string;
  };

  // Logging settings
  logging: {
    level: LogLevel;
    file?: string;
  };
}
