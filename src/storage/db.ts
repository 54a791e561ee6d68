/**
 * Database Connection Factory
 *
 * Opens an SQLite database with better-sqlite3, enables foreign keys,
 * applies `schema.sql` and wraps the connection with Drizzle ORM.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *
 *   const db = createDatabase(config.database.path);
 *   const testDb = createDatabase(':memory:');
 */

import { mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';

/** Location of the DDL applied on every open. */
export const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

/**
 * Creates the tables and indexes that do not exist yet.
 */
export function applySchema(sqlite: Database.Database): void {
  sqlite.exec(readFileSync(SCHEMA_PATH, 'utf8'));
}

/**
 * Creates a Drizzle ORM database instance backed by the SQLite file at
 * `dbPath`. The parent directory is created when missing; `:memory:` gives
 * a private in-memory database.
 *
 * @example
 * const db = createDatabase('./data/study-planner.db');
 * const plans = await db.select().from(studyPlans);
 */
export function createDatabase(dbPath: string) {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // SQLite ships with foreign keys off
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('journal_mode = WAL');
  applySchema(sqlite);

  return drizzle(sqlite, { schema });
}

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = ReturnType<typeof createDatabase>;
