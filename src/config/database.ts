import { Pool, PoolConfig } from 'pg';
import { env } from './env.js';
import { logger } from '../utils/logger.js';

const poolConfig: PoolConfig = {
  connectionString: env.DATABASE_URL,
  max: 10, // Maximum number of clients in the pool
  idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
  connectionTimeoutMillis: 10000, // Return error after 10 seconds if connection not established
  ssl: env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : undefined,
};

export const pool = new Pool(poolConfig);

// Idle client failures surface on the next query.
pool.on('error', (err) => {
  logger.error({ error: err.message }, 'Unexpected error on idle database client');
});

export async function connectDatabase(): Promise<void> {
  const client = await pool.connect();
  try {
    const result = await client.query<{ now: Date }>('SELECT NOW() AS now');
    logger.info({ at: result.rows[0]?.now }, 'Database connected');
  } finally {
    client.release();
  }
}

export async function closeDatabase(): Promise<void> {
  await pool.end();
  logger.info('Database pool closed');
}
