import 'dotenv/config';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { configService } from './services/config.service';

export type SqliteDatabase = Database.Database;

let database: SqliteDatabase | null = null;

/**
 * Ensure the directory for the database file exists
 */
function ensureDatabaseDirectory(dbPath: string): void {
  if (dbPath === ':memory:') {
    return;
  }
  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Open a SQLite connection with the pragmas every caller relies on:
 * foreign keys enforced, WAL journaling for file databases, and a busy
 * timeout so concurrent writers wait instead of failing.
 */
export function openDatabase(databasePath: string): SqliteDatabase {
  ensureDatabaseDirectory(databasePath);
  const db = new Database(databasePath);
  if (databasePath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  return db;
}

/**
 * Process-wide connection, opened on first use at the configured path.
 */
export function getDatabase(): SqliteDatabase {
  if (!database) {
    database = openDatabase(configService.getDatabasePath());
  }
  return database;
}

export function closeDatabase(): void {
  if (database) {
    database.close();
    database = null;
  }
}
