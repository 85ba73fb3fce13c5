import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { config } from '../config/env.js';
import { DB_CONFIG } from '../config/constants.js';
import { createLogger } from '../utils/logger.js';
import * as schema from './schema.js';

const { Pool } = pg;
const log = createLogger('db');

export type Database = NodePgDatabase<typeof schema>;

/**
 * Create the connection pool and Drizzle instance
 */
export function createDatabase(connectionString: string = config.databaseUrl): {
  db: Database;
  pool: pg.Pool;
} {
  const pool = new Pool({
    connectionString,
    max: DB_CONFIG.POOL_SIZE,
    idleTimeoutMillis: DB_CONFIG.IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: DB_CONFIG.CONNECTION_TIMEOUT_MS,
    ssl: config.isProd ? { rejectUnauthorized: false } : undefined,
  });

  pool.on('error', (err) => {
    log.error({ err }, 'Database pool error');
  });

  return { db: drizzle(pool, { schema }), pool };
}

/**
 * Test database connection
 */
export async function testConnection(pool: pg.Pool): Promise<boolean> {
  try {
    const client = await pool.connect();
    await client.query('SELECT 1');
    client.release();
    log.info('Database connection successful');
    return true;
  } catch (error) {
    log.error({ err: error }, 'Database connection failed');
    return false;
  }
}

// Export schema
export * from './schema.js';
