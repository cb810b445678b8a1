import Database from 'better-sqlite3';
import { ConfigManager } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { ensureDir } from '../utils/filesystem.js';
import { dirname } from 'path';
import { Migration } from './migration.js';
import { TABLES } from './schema.js';

export class DatabaseConnection {
  private static instance: DatabaseConnection | undefined;
  private db: Database.Database | null = null;
  private readonly path: string;
  private readonly options: Database.Options;

  /**
   * Defaults to the configured database file; pass a path to open a separate store
   */
  public constructor(path?: string) {
    const config = ConfigManager.getInstance().getConfig();
    this.path = path ?? config.database.path;
    this.options = config.database.options;
  }

  public static getInstance(): DatabaseConnection {
    if (!DatabaseConnection.instance) {
      DatabaseConnection.instance = new DatabaseConnection();
    }
    return DatabaseConnection.instance;
  }

  public static resetInstance(): void {
    DatabaseConnection.instance?.close();
    DatabaseConnection.instance = undefined;
  }

  /**
   * Initialize database connection
   */
  public async initialize(): Promise<void> {
    if (this.db) {
      logger().debug('Database already initialized');
      return;
    }

    try {
      // Ensure the database directory exists
      await ensureDir(dirname(this.path));

      // Open (or create) the task database
      this.db = new Database(this.path, this.options);
      logger().info('Database connection established', { path: this.path });

      // Task rows are written on every status change; WAL keeps readers unblocked
      this.db.pragma('journal_mode = WAL');

      // Bring the schema up to date before any task is read
      const migration = new Migration(this.db);
      migration.migrate();
    } catch (error) {
      logger().error('Failed to initialize database', { error });
      this.db?.close();
      this.db = null;
      throw error;
    }
  }

  /**
   * Get database instance
   */
  public getDatabase(): Database.Database {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  public getPath(): string {
    return this.path;
  }

  /**
   * Close database connection
   */
  public close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      logger().info('Database connection closed');
    }
  }

  /**
   * Execute a transaction
   */
  public transaction<T>(fn: (db: Database.Database) => T): T {
    const db = this.getDatabase();
    return db.transaction(fn)(db);
  }

  public prepare(sql: string): Database.Statement {
    return this.getDatabase().prepare(sql);
  }

  public exec(sql: string): void {
    this.getDatabase().exec(sql);
  }

  public isInitialized(): boolean {
    return this.db !== null;
  }

  /**
   * Get database statistics
   */
  public getStats(): {
    taskCount: number;
    databaseSize: number;
  } {
    const db = this.getDatabase();

    // Row count plus on-disk size from SQLite's page accounting
    const taskCount = (db.prepare(`SELECT COUNT(*) as count FROM ${TABLES.download_tasks}`).get() as { count: number }).count;

    const pageCount = (db.prepare('PRAGMA page_count').get() as { page_count: number }).page_count;
    const pageSize = (db.prepare('PRAGMA page_size').get() as { page_size: number }).page_size;

    return {
      taskCount,
      databaseSize: pageCount * pageSize,
    };
  }
}

// Export convenience functions
export const getDb = (): Database.Database => DatabaseConnection.getInstance().getDatabase();
export const initializeDb = async (): Promise<void> => DatabaseConnection.getInstance().initialize();
export const closeDb = (): void => DatabaseConnection.getInstance().close();
