import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { getPool } from './connection.js';
import { logger } from '../utils/logger.js';

// Beside this module in dev (src/), fall back to the source tree when running from dist/
const besideModule = fileURLToPath(new URL('./migrations', import.meta.url));
const srcPath = path.resolve(process.cwd(), 'src', 'database', 'migrations');
const migrationsPath = fs.existsSync(besideModule) ? besideModule : srcPath;

export async function runMigrations(): Promise<void> {
  const pool = getPool();

  // Create migrations tracking table
  await pool.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      executed_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);

  const files = fs.readdirSync(migrationsPath)
    .filter(f => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const { rows } = await pool.query(
      'SELECT id FROM _migrations WHERE name = $1',
      [file]
    );

    if (rows.length > 0) {
      logger.debug(`Migration ${file} already applied, skipping`);
      continue;
    }

    const sql = fs.readFileSync(path.join(migrationsPath, file), 'utf-8');
    logger.info(`Running migration: ${file}`);

    await pool.query(sql);
    await pool.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);

    logger.info(`Migration ${file} applied successfully`);
  }

  logger.info('All migrations complete');
}
