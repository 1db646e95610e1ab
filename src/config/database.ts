import { Pool } from 'pg';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import logger from './logger';
import { errorMessage } from '../utils/AppError';

export type Database = NodePgDatabase;

export interface DatabaseHandle {
  pool: Pool;
  db: Database;
}

/**
 * Creates the pg pool and the drizzle handle over it.
 * Connection problems surface on first query, not here.
 */
export function createDatabase(databaseUrl: string): DatabaseHandle {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
  });

  pool.on('error', (error) => {
    logger.error('Postgres pool error:', { error: errorMessage(error) });
  });

  return { pool, db: drizzle(pool) };
}

/**
 * Startup connectivity check (non-fatal)
 */
export async function testConnection(pool: Pool): Promise<boolean> {
  try {
    await pool.query('SELECT 1');
    logger.info('✅ Database connection established');
    return true;
  } catch (error) {
    logger.error('❌ Database connection failed:', { error: errorMessage(error) });
    return false;
  }
}
