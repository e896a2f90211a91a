import 'dotenv/config';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { closePool, getPool } from '../db/client';
import { logger } from '../utils/logger';

/**
 * schema.sql sits beside the sources; compiled scripts look for it there too
 */
export function resolveSchemaPath(): string {
  const candidates = [
    join(__dirname, '../db/schema.sql'),
    join(__dirname, '../../../src/db/schema.sql'),
    join(process.cwd(), 'src/db/schema.sql'),
  ];
  const found = candidates.find(candidate => existsSync(candidate));
  if (!found) {
    throw new Error(`schema.sql not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

/**
 * Database migration script
 * Runs the schema.sql file to set up the database
 */
async function migrate(): Promise<void> {
  try {
    logger.info('Starting database migration...');

    const schema = readFileSync(resolveSchemaPath(), 'utf-8');
    await getPool().query(schema);

    logger.info('Database migration completed successfully');
  } finally {
    await closePool();
  }
}

if (require.main === module) {
  migrate().catch((error: unknown) => {
    logger.error('Database migration failed', error);
    process.exitCode = 1;
  });
}
