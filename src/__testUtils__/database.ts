import { newDb } from 'pg-mem';
import { setPool } from '../database/connection.js';
import { runMigrations } from '../database/migrate.js';

/** Points the pool at a fresh in-memory PostgreSQL with all migrations applied. */
export async function useTestDatabase(): Promise<void> {
  const db = newDb();
  const { Pool } = db.adapters.createPg();
  setPool(new Pool());
  await runMigrations();
}
