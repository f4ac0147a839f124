import pg from 'pg';
import type { PoolConfig } from 'pg';
import { env } from './env.js';
import { logger } from '../utils/logger.js';

const poolConfig: PoolConfig = {
  connectionString: env.DATABASE_URL,
  max: 5, // One sequential job per process; a handful of clients is plenty
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 10000,
  ssl: env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : undefined,
};

export const pool = new pg.Pool(poolConfig);

pool.on('error', (err) => {
  logger.error({ error: err.message }, 'Unexpected error on idle database client');
});

export async function connectDatabase(): Promise<void> {
  const client = await pool.connect();
  try {
    const result = await client.query<{ now: Date }>('SELECT NOW() AS now');
    logger.info({ now: result.rows[0]?.now }, 'Database connected');
  } finally {
    client.release();
  }
}

export async function closeDatabase(): Promise<void> {
  await pool.end();
  logger.debug('Database pool closed');
}
