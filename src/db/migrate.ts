import { readFileSync } from 'fs';
import { Pool } from 'pg';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const SCHEMA_PATH = join(__dirname, 'schema.sql');

export async function applySchema(pool: Pool): Promise<string[]> {
  const schema = readFileSync(SCHEMA_PATH, 'utf-8');
  await pool.query(schema);

  const result = await pool.query<{ table_name: string }>(`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = 'public'
    AND table_type = 'BASE TABLE'
    ORDER BY table_name
  `);

  return result.rows.map((row) => row.table_name);
}

async function migrate() {
  const pool = new Pool({ connectionString: env.DATABASE_URL });

  try {
    logger.info('Running migrations...');
    const tables = await applySchema(pool);
    logger.info({ tables }, 'Schema applied');
  } catch (error) {
    logger.fatal({ error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (process.argv[1] === __filename) {
  await migrate();
}
