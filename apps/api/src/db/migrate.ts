import { drizzle } from 'drizzle-orm/node-postgres';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import pg from 'pg';
import { config } from '../config/env.js';
import { createLogger } from '../utils/logger.js';

const { Pool } = pg;
const log = createLogger('migrate');

async function runMigrations(): Promise<void> {
  log.info('Running database migrations');

  const pool = new Pool({
    connectionString: config.databaseUrl,
    ssl: config.isProd ? { rejectUnauthorized: false } : undefined,
  });

  const db = drizzle(pool);

  try {
    await migrate(db, { migrationsFolder: './drizzle' });
    log.info('Migrations completed successfully');
  } catch (error) {
    log.error({ err: error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

runMigrations().catch((error: unknown) => {
  log.error({ err: error }, 'Migration runner crashed');
  process.exitCode = 1;
});
