import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { pool, closeDatabase } from '../config/database.js';
import { logger } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

async function migrate(): Promise<void> {
  try {
    logger.info('Running migrations');

    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');

    await pool.query(schema);

    const result = await pool.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      AND table_type = 'BASE TABLE'
      ORDER BY table_name
    `);

    logger.info({ tables: result.rows.map((row) => row.table_name) }, 'Schema created successfully');
  } catch (error) {
    logger.error({ error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await closeDatabase();
  }
}

void migrate();
