import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { Logger, logger, error, warn, info, debug, describeError, consoleLine } from '../src/utils/logger.js';
import { ConfigManager } from '../src/config/index.js';
import winston from 'winston';
import { join } from 'path';
import { PassThrough } from 'stream';
import { createTempDir } from '../src/utils/filesystem.js';

describe('Logger', () => {
  let tempDir: string;

  beforeEach(async () => {
    vi.restoreAllMocks();
    delete process.env.LOG_FILE;
    delete process.env.LOG_LEVEL;
    // createTempDir logs, so the singletons are reset after it
    tempDir = await createTempDir('logger-test-');
    Logger.resetInstance();
    ConfigManager.resetInstance();
  });

  afterEach(() => {
    // File transports open their streams lazily, so the temp dir is left in place
    delete process.env.LOG_FILE;
    delete process.env.LOG_LEVEL;
    Logger.resetInstance();
    ConfigManager.resetInstance();
  });

  const fileTransports = (instance: Logger): winston.transport[] =>
    instance.getLogger().transports.filter((transport) => transport instanceof winston.transports.File);

  it('should return singleton instance', () => {
    const instance1 = Logger.getInstance();
    const instance2 = Logger.getInstance();
    expect(instance1).toBe(instance2);
  });

  it('should write console output to stderr for every level', () => {
    const consoleTransport = Logger.getInstance()
      .getLogger()
      .transports.find((transport) => transport instanceof winston.transports.Console);

    expect(consoleTransport).toBeInstanceOf(winston.transports.Console);
    if (consoleTransport instanceof winston.transports.Console) {
      expect(Object.keys(consoleTransport.stderrLevels).sort()).toEqual(['debug', 'error', 'info', 'warn']);
    }
  });

  it('should create logger with file transport when configured', () => {
    process.env.LOG_FILE = join(tempDir, 'configured.log');

    expect(fileTransports(Logger.getInstance())).toHaveLength(1);
  });

  it('should log messages at different levels', () => {
    const loggerInstance = Logger.getInstance();
    const winstonLogger = loggerInstance.getLogger();

    const errorSpy = vi.spyOn(winstonLogger, 'error');
    const warnSpy = vi.spyOn(winstonLogger, 'warn');
    const infoSpy = vi.spyOn(winstonLogger, 'info');
    const debugSpy = vi.spyOn(winstonLogger, 'debug');

    loggerInstance.error('Error message', { code: 'NETWORK_ERROR' });
    loggerInstance.warn('Warning message');
    loggerInstance.info('Info message');
    loggerInstance.debug('Debug message');

    expect(errorSpy).toHaveBeenCalledWith('Error message', { code: 'NETWORK_ERROR' });
    expect(warnSpy).toHaveBeenCalledWith('Warning message', undefined);
    expect(infoSpy).toHaveBeenCalledWith('Info message', undefined);
    expect(debugSpy).toHaveBeenCalledWith('Debug message', undefined);
  });

  it('should use convenience functions', () => {
    const winstonLogger = logger().getLogger();

    const errorSpy = vi.spyOn(winstonLogger, 'error');
    const warnSpy = vi.spyOn(winstonLogger, 'warn');
    const infoSpy = vi.spyOn(winstonLogger, 'info');
    const debugSpy = vi.spyOn(winstonLogger, 'debug');

    error('Error via convenience', { detail: 'test' });
    warn('Warn via convenience');
    info('Info via convenience');
    debug('Debug via convenience');

    expect(errorSpy).toHaveBeenCalledWith('Error via convenience', { detail: 'test' });
    expect(warnSpy).toHaveBeenCalledWith('Warn via convenience', undefined);
    expect(infoSpy).toHaveBeenCalledWith('Info via convenience', undefined);
    expect(debugSpy).toHaveBeenCalledWith('Debug via convenience', undefined);
  });

  it('should set log level', () => {
    const loggerInstance = Logger.getInstance();
    const winstonLogger = loggerInstance.getLogger();

    expect(winstonLogger.level).toBe('info');

    loggerInstance.setLevel('debug');
    expect(winstonLogger.level).toBe('debug');

    loggerInstance.setLevel('error');
    expect(winstonLogger.level).toBe('error');
  });

  it('should respect log level from environment', () => {
    process.env.LOG_LEVEL = 'warn';

    expect(Logger.getInstance().getLogger().level).toBe('warn');
  });

  it('should add a file transport and replace it on a second call', async () => {
    const loggerInstance = Logger.getInstance();
    expect(fileTransports(loggerInstance)).toHaveLength(0);

    await loggerInstance.setLogFile(join(tempDir, 'logs', 'first.log'));
    expect(fileTransports(loggerInstance)).toHaveLength(1);

    await loggerInstance.setLogFile(join(tempDir, 'logs', 'second.log'));
    expect(fileTransports(loggerInstance)).toHaveLength(1);
  });

  it('should print the task id after the message on the console', async () => {
    const output = new PassThrough();
    let text = '';
    output.on('data', (chunk: Buffer) => {
      text += chunk.toString();
    });
    const lines = (): string[] => text.split(/\r?\n/).filter((line) => line.length > 0);
    const captured = winston.createLogger({
      format: winston.format.combine(winston.format.timestamp({ format: () => 'T0' }), consoleLine),
      transports: [new winston.transports.Stream({ stream: output })],
    });

    captured.info('Transfer negotiated', { id: 'task-7', resumeFrom: 3000 });
    captured.warn('Store unavailable');

    await vi.waitFor(() => expect(lines()).toHaveLength(2));
    expect(lines()).toEqual(['T0 [info]: Transfer negotiated (task-7) {"resumeFrom":3000}', 'T0 [warn]: Store unavailable']);
  });

  it('should describe thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
