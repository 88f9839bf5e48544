import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import fs from 'fs';
import path from 'path';
import * as schema from './schema';

export type SqliteDb = BetterSQLite3Database<typeof schema>;

export interface SqliteHandle {
  sqlite: Database.Database;
  db: SqliteDb;
}

/**
 * Open (or create) the engine database. Pass ':memory:' for a throwaway
 * database. Tables are created if missing.
 */
export function createSqliteDb(dbPath: string): SqliteHandle {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Enable WAL mode for better concurrent access
  sqlite.pragma('journal_mode = WAL');
  sqlite.exec(schema.CREATE_TABLES_SQL);

  return { sqlite, db: drizzle(sqlite, { schema }) };
}

// Export schema for migrations
export { schema };
