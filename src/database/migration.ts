import type { Database } from 'better-sqlite3';
import { logger } from '../utils/logger.js';
import { SCHEMA_VERSION, CREATE_TABLES_SQL, TABLES } from './schema.js';

interface MigrationStep {
  version: number;
  description: string;
  up(db: Database): void;
}

export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  applied: number[];
}

const STEPS: MigrationStep[] = [
  {
    version: 1,
    description: 'create download_tasks and schema_version',
    up: (db) => db.exec(CREATE_TABLES_SQL),
  },
];

/**
 * Brings the task database up to SCHEMA_VERSION, one step per version,
 * all inside a single transaction.
 */
export class Migration {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  public migrate(): MigrationResult {
    const fromVersion = this.getCurrentVersion();
    if (fromVersion >= SCHEMA_VERSION) {
      logger().debug('Task schema is up to date', { version: fromVersion });
      return { fromVersion, toVersion: fromVersion, applied: [] };
    }

    logger().info('Migrating task database', { from: fromVersion, to: SCHEMA_VERSION });

    // Steps above the stored version, oldest first
    const pending = STEPS.filter((step) => step.version > fromVersion && step.version <= SCHEMA_VERSION);

    const run = this.db.transaction(() => {
      for (const step of pending) {
        logger().info(`Applying task schema v${step.version}: ${step.description}`);
        step.up(this.db);
        this.db.prepare(`INSERT OR REPLACE INTO ${TABLES.schema_version} (version) VALUES (?)`).run(step.version);
      }
    });

    try {
      run();
    } catch (error) {
      logger().error('Task database migration failed, rolled back', { from: fromVersion, error });
      throw error;
    }

    const applied = pending.map((step) => step.version);
    logger().info('Task database migrated', { version: SCHEMA_VERSION, applied });
    return { fromVersion, toVersion: SCHEMA_VERSION, applied };
  }

  public needsMigration(): boolean {
    return this.getCurrentVersion() < SCHEMA_VERSION;
  }

  /**
   * Drops the task tables. Returns how many task rows were discarded.
   */
  public reset(): number {
    const discarded = this.countTasks();
    logger().warn(`Resetting task database - ${discarded} download task(s) will be lost`);

    const drop = this.db.transaction(() => {
      this.db.exec(`DROP TABLE IF EXISTS ${TABLES.download_tasks}`);
      this.db.exec(`DROP TABLE IF EXISTS ${TABLES.schema_version}`);
    });
    drop();

    logger().info('Task database reset', { discarded });
    return discarded;
  }

  private getCurrentVersion(): number {
    if (!this.hasTable(TABLES.schema_version)) {
      return 0;
    }

    const result = this.db
      .prepare(`SELECT MAX(version) as version FROM ${TABLES.schema_version}`)
      .get() as { version: number | null } | undefined;

    return result?.version ?? 0;
  }

  private countTasks(): number {
    if (!this.hasTable(TABLES.download_tasks)) {
      return 0;
    }
    const row = this.db.prepare(`SELECT COUNT(*) as count FROM ${TABLES.download_tasks}`).get() as { count: number };
    return row.count;
  }

  private hasTable(name: string): boolean {
    const row = this.db.prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name=?`).get(name);
    return row !== undefined;
  }
}
