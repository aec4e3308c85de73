import 'dotenv/config';

import { Pool } from 'pg';

import { getEnv } from '../config/env.js';
import { createLogger } from '../logging/logger.js';
import { applyPendingMigrations } from './migrations.js';

async function run(): Promise<void> {
  const env = getEnv();
  const logger = createLogger({ name: 'migrate', level: env.LOG_LEVEL });

  if (typeof env.DATABASE_URL !== 'string' || env.DATABASE_URL.length === 0) {
    throw new Error('DATABASE_URL must be configured to run migrations.');
  }

  const pool = new Pool({ connectionString: env.DATABASE_URL });

  try {
    const applied = await applyPendingMigrations(pool, logger);
    logger.info({ applied }, 'Migration run complete.');
  } finally {
    await pool.end();
  }
}

void run().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
