import { promises as fs, constants as fsConstants } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { logger } from './logger.js';

export class FileSystemUtils {
  /**
   * Ensure directory exists, create if not
   */
  public static async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
      logger().debug(`Directory ensured: ${dirPath}`);
    } catch (error) {
      logger().error(`Failed to create directory: ${dirPath}`, { error });
      throw error;
    }
  }

  /**
   * Check if file or directory exists
   */
  public static async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Remove a file. Missing files are not an error.
   * Resolves true when something was removed.
   */
  public static async removeFile(path: string): Promise<boolean> {
    try {
      await fs.unlink(path);
      logger().debug(`Removed: ${path}`);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      logger().error(`Failed to remove: ${path}`, { error });
      throw error;
    }
  }

  /**
   * Remove directory recursively
   */
  public static async removeDir(path: string): Promise<void> {
    await fs.rm(path, { recursive: true, force: true });
    logger().debug(`Removed directory: ${path}`);
  }

  /**
   * Size of a regular file in bytes, 0 when it does not exist
   */
  public static async getFileSize(filePath: string): Promise<number> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile() ? stats.size : 0;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return 0;
      }
      logger().error(`Failed to get file size: ${filePath}`, { error });
      throw error;
    }
  }

  public static async isDirectory(path: string): Promise<boolean> {
    try {
      return (await fs.stat(path)).isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Create (if needed) the directory that will hold filePath and check that
   * it, and the file when present, accept writes
   */
  public static async ensureWritableFile(filePath: string): Promise<void> {
    const dir = dirname(filePath);
    await FileSystemUtils.ensureDir(dir);
    await fs.access(dir, fsConstants.W_OK);
    if (await FileSystemUtils.exists(filePath)) {
      await fs.access(filePath, fsConstants.W_OK);
    }
  }

  public static async ensureWritableDir(dirPath: string): Promise<void> {
    await FileSystemUtils.ensureDir(dirPath);
    await fs.access(dirPath, fsConstants.W_OK);
  }

  /**
   * Create a temporary directory
   */
  public static async createTempDir(prefix = 'download-manager-'): Promise<string> {
    try {
      const tempDir = await fs.mkdtemp(join(tmpdir(), prefix));
      logger().debug(`Created temp directory: ${tempDir}`);
      return tempDir;
    } catch (error) {
      logger().error('Failed to create temp directory', { error });
      throw error;
    }
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

// Export convenience functions
export const ensureDir = FileSystemUtils.ensureDir.bind(FileSystemUtils);
export const exists = FileSystemUtils.exists.bind(FileSystemUtils);
export const removeFile = FileSystemUtils.removeFile.bind(FileSystemUtils);
export const removeDir = FileSystemUtils.removeDir.bind(FileSystemUtils);
export const getFileSize = FileSystemUtils.getFileSize.bind(FileSystemUtils);
export const isDirectory = FileSystemUtils.isDirectory.bind(FileSystemUtils);
export const ensureWritableFile = FileSystemUtils.ensureWritableFile.bind(FileSystemUtils);
export const ensureWritableDir = FileSystemUtils.ensureWritableDir.bind(FileSystemUtils);
export const createTempDir = FileSystemUtils.createTempDir.bind(FileSystemUtils);
