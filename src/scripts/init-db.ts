#!/usr/bin/env tsx

import { DatabaseConnection } from '../database/connection.js';
import { Migration } from '../database/migration.js';
import { TABLES } from '../database/schema.js';
import { logger } from '../utils/logger.js';

async function main() {
  const reset = process.argv.includes('--reset');
  logger().info('Initializing download task database...');

  try {
    const dbConnection = DatabaseConnection.getInstance();
    await dbConnection.initialize();
    const db = dbConnection.getDatabase();

    const migration = new Migration(db);
    if (reset) {
      // Drop every task, then build the schema again from v1
      const discarded = migration.reset();
      const result = migration.migrate();
      logger().info('Database rebuilt', { discarded, applied: result.applied });
    } else if (migration.needsMigration()) {
      logger().info('Database needs migration');
      migration.migrate();
    } else {
      logger().info('Database schema is up to date');
    }

    // Summarise what survived, grouped by status

    const counts = db.prepare(
      `SELECT status, COUNT(*) as count FROM ${TABLES.download_tasks} GROUP BY status ORDER BY status`
    ).all() as Array<{ status: string; count: number }>;

    const stats = dbConnection.getStats();
    logger().info('Database ready', {
      path: dbConnection.getPath(),
      tasks: stats.taskCount,
      sizeBytes: stats.databaseSize,
      byStatus: Object.fromEntries(counts.map((row) => [row.status, row.count])),
    });

    dbConnection.close();
  } catch (error) {
    logger().error('Database initialization failed:', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined
    });
    process.exit(1);
  }
}

main().catch(console.error);
