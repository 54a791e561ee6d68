/**
 * Database Migration Runner
 *
 * Applies `schema.sql` to the configured SQLite file and lists the tables
 * that exist afterwards. Every statement is `IF NOT EXISTS`, so running it
 * again is safe.
 *
 * Usage:
 *   npm run db:migrate
 *   DATABASE_PATH=/path/to/db npm run db:migrate
 */

import { config } from '../config';
import { createDatabase } from './db';

console.log(`[migrate] Database path: ${config.database.path}`);
console.log('[migrate] Applying schema...');

try {
  const sqlite = createDatabase(config.database.path).$client;

  const tables = sqlite
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all();

  console.log('[migrate] Tables in database:');
  for (const table of tables) {
    console.log(`  - ${table.name}`);
  }

  const foreignKeys = sqlite.pragma('foreign_keys', { simple: true });
  console.log(`[migrate] Foreign key enforcement: ${foreignKeys === 1 ? 'ENABLED' : 'DISABLED'}`);

  sqlite.close();
} catch (error) {
  console.error('[migrate] Migration failed:', error);
  process.exit(1);
}
