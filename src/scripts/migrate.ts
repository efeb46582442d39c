import 'dotenv/config';
import { readFileSync } from 'fs';
import { join } from 'path';
import { loadDatabaseConfig } from '../config';
import { createPool, closePool } from '../db/client';
import { logger } from '../utils/logger';

/**
 * Database migration script
 * Runs the schema.sql file to set up the database
 */
async function migrate(): Promise<void> {
  const pool = createPool(loadDatabaseConfig());
  try {
    logger.info('Starting database migration...');

    const schemaPath = join(__dirname, '../db/schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    await pool.query(schema);

    logger.info('Database migration completed successfully');
  } finally {
    await closePool(pool);
  }
}

migrate()
  .then(() => {
    process.exit(0);
  })
  .catch(error => {
    logger.error('Database migration failed', error);
    process.exit(1);
  });
