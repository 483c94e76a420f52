import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import * as schema from './schema';
import { FILE_PATHS } from '@camstation/config';
import { createLogger } from '@camstation/utils';
import fs from 'fs';
import path from 'path';

const logger = createLogger('database');

export type AppDatabase = BetterSQLite3Database<typeof schema>;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY NOT NULL,
    value TEXT NOT NULL,
    updated_at INTEGER NOT NULL DEFAULT (unixepoch())
  );
  CREATE TABLE IF NOT EXISTS captures (
    id TEXT PRIMARY KEY NOT NULL,
    kind TEXT NOT NULL,
    file_path TEXT NOT NULL,
    device_path TEXT,
    width INTEGER,
    height INTEGER,
    file_size INTEGER,
    created_at INTEGER NOT NULL DEFAULT (unixepoch())
  );
  CREATE INDEX IF NOT EXISTS captures_kind_created_idx ON captures (kind, created_at);
`;

let db: AppDatabase | null = null;
let sqlite: Database.Database | null = null;

/**
 * Open a SQLite database and make sure the tables exist.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): { db: AppDatabase; sqlite: Database.Database } {
  if (dbPath !== ':memory:') {
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
      logger.info(`Created database directory: ${dbDir}`);
    }
  }

  const connection = new Database(dbPath);
  connection.pragma('journal_mode = WAL');
  connection.exec(SCHEMA_SQL);

  return { db: drizzle(connection, { schema }), sqlite: connection };
}

/**
 * Initialize the shared database connection
 */
export function initDatabase(dbPath: string = FILE_PATHS.DATABASE): AppDatabase {
  try {
    const opened = openDatabase(dbPath);
    db = opened.db;
    sqlite = opened.sqlite;
    logger.info(`Database initialized at: ${dbPath}`);
    return opened.db;
  } catch (error) {
    logger.error('Failed to initialize database:', error);
    throw error;
  }
}

/**
 * Close database connection
 */
export function closeDatabase(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = null;
    db = null;
    logger.info('Database connection closed');
  }
}

/**
 * Get database instance
 */
export function getDatabase(): AppDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export * from './schema';
