/**
 * Drizzle Kit Configuration
 *
 * Used by `npm run db:studio` to inspect the SQLite database. The tables
 * themselves are created from src/storage/schema.sql when the database is
 * opened; src/storage/schema.ts is the typed mirror Drizzle queries through.
 */
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/schema.ts',

  dialect: 'sqlite',

  dbCredentials: {
    url: process.env.DATABASE_PATH || './data/study-planner.db',
  },

  verbose: true,

  strict: true,
});
