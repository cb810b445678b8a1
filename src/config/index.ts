import { Config, LogLevel } from './types.js';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function parseLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? 'info';
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: Config;

  private constructor() {
    this.config = this.loadConfig();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Drop the cached instance so the next access re-reads the environment
   */
  public static resetInstance(): void {
    ConfigManager.instance = undefined;
  }

  public getConfig(): Config {
    return this.config;
  }

  public get<K extends keyof Config>(key: K): Config[K] {
    return this.config[key];
  }

  private loadConfig(): Config {
    const rootDir = join(__dirname, '..', '..');
    const dataDir = join(rootDir, 'data');
    const downloadsDir = process.env.DOWNLOAD_DIR ?? join(dataDir, 'downloads');
    const databaseFile = process.env.DATABASE_PATH ?? join(dataDir, 'downloads.db');

    const config: Config = {
      server: {
        name: 'download-manager',
        version: '0.1.0',
      },
      database: {
        path: databaseFile,
        options: {
          verbose: process.env.NODE_ENV === 'development'
            ? /* eslint-disable-next-line no-console */
              console.log.bind(console)
            : undefined,
          readonly: false,
          fileMustExist: false,
        },
      },
      downloads: {
        directory: downloadsDir,
        chunkSize: parseInt(process.env.DOWNLOAD_CHUNK_SIZE ?? '8192', 10),
        timeout: parseInt(process.env.DOWNLOAD_TIMEOUT ?? '300000', 10),
        speedWindow: parseInt(process.env.DOWNLOAD_SPEED_WINDOW ?? '3000', 10),
        persistInterval: parseInt(process.env.DOWNLOAD_PERSIST_INTERVAL ?? '500', 10),
        userAgent: process.env.DOWNLOAD_USER_AGENT ?? 'download-manager/0.1.0',
      },
      paths: {
        dataDir,
        downloadsDir,
        databaseFile,
      },
      logging: {
        level: parseLogLevel(process.env.LOG_LEVEL),
        file: process.env.LOG_FILE,
      },
    };

    return config;
  }

  public updateConfig(updates: Partial<Config>): void {
    this.config = { ...this.config, ...updates };
  }
}

// Export singleton instance getter
export const getConfig = (): Config => ConfigManager.getInstance().getConfig();
