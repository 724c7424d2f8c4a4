// ============================================
// CAPITOL - Database Configuration
// ============================================

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import path from 'path';
import { env } from './env.js';
import * as schema from '../db/schema/index.js';

export type DrizzleDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseConnection {
  sqlite: Database.Database;
  db: DrizzleDb;
}

const IN_MEMORY = ':memory:';

export function getDbPath(dbPath: string = env.DB_PATH): string {
  if (dbPath === IN_MEMORY) return dbPath;
  return path.isAbsolute(dbPath)
    ? dbPath
    : path.join(process.cwd(), dbPath);
}

/**
 * Create tables if they are missing (CREATE TABLE IF NOT EXISTS).
 * Must stay in step with src/db/schema.
 */
function ensureTablesExist(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS saves (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      seed INTEGER NOT NULL,
      year INTEGER NOT NULL,
      month INTEGER NOT NULL,
      turn INTEGER NOT NULL,
      payload TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      CONSTRAINT unique_save_name UNIQUE (name)
    );
    CREATE INDEX IF NOT EXISTS idx_saves_updated_at ON saves(updated_at);
  `);
}

/**
 * Open a SQLite database (a file path, or ':memory:' for tests) and wrap it
 * with Drizzle. The caller owns the connection and closes it.
 */
export function openDatabase(dbPath: string = getDbPath()): DatabaseConnection {
  const sqlite = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    sqlite.pragma('journal_mode = WAL');
  }
  ensureTablesExist(sqlite);
  return { sqlite, db: drizzle(sqlite, { schema }) };
}

export function closeDatabase(connection: DatabaseConnection): void {
  if (connection.sqlite.open) {
    connection.sqlite.close();
  }
}
