import winston from 'winston';
import { ConfigManager } from '../config/index.js';
import type { LogLevel } from '../config/types.js';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';

/**
 * `<time> [level]: message` followed by the task id, when the entry has one,
 * and the rest of the metadata as JSON
 */
export const consoleLine = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const { id, ...rest } = meta;
  const task = typeof id === 'string' ? ` (${id})` : '';
  const metaStr = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
  return `${String(timestamp)} [${String(level)}]: ${String(message)}${task}${metaStr}`;
});

function createFileTransport(filename: string): winston.transport {
  return new winston.transports.File({
    filename,
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  });
}

export class Logger {
  private static instance: Logger | undefined;
  private logger: winston.Logger;

  private constructor() {
    const config = ConfigManager.getInstance().getConfig();
    this.logger = this.createLogger(config.logging);
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public static resetInstance(): void {
    Logger.instance = undefined;
  }

  private createLogger(loggingConfig: { level: LogLevel; file?: string }): winston.Logger {
    // Console first; stdout carries the MCP JSON-RPC stream, so every level goes to stderr
    const transports: winston.transport[] = [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
        format: winston.format.combine(winston.format.colorize(), winston.format.timestamp(), consoleLine),
      }),
    ];

    // Optional JSON log file for long-running servers
    if (loggingConfig.file) {
      transports.push(createFileTransport(loggingConfig.file));
    }

    return winston.createLogger({
      level: loggingConfig.level,
      transports,
    });
  }

  /**
   * Send log output to a file as well, replacing any file set earlier
   */
  public async setLogFile(filepath: string): Promise<void> {
    await mkdir(dirname(filepath), { recursive: true });

    const current = this.logger.transports.find((transport) => transport instanceof winston.transports.File);
    if (current) {
      this.logger.remove(current);
    }

    this.logger.add(createFileTransport(filepath));
  }

  public error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  public warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  public info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  public debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  public setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }
}

// Export convenient functions
export const logger = (): Logger => Logger.getInstance();
export const error = (message: string, meta?: Record<string, unknown>): void =>
  logger().error(message, meta);
export const warn = (message: string, meta?: Record<string, unknown>): void =>
  logger().warn(message, meta);
export const info = (message: string, meta?: Record<string, unknown>): void =>
  logger().info(message, meta);
export const debug = (message: string, meta?: Record<string, unknown>): void =>
  logger().debug(message, meta);

/**
 * Reduce an unknown thrown value to something winston can serialize
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
