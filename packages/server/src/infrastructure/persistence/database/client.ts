/**
 * @file client.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import * as schema from './schema.js';

export type DrizzleDatabase = BetterSQLite3Database<typeof schema>;

const IN_MEMORY = ':memory:';

let db: DrizzleDatabase | null = null;
let sqlite: Database.Database | null = null;

/**
 * Initializes the database connection.
 * Pass ":memory:" for a throwaway database.
 */
export function initDatabase(filePath: string): DrizzleDatabase {
  if (db) {
    return db;
  }

  if (filePath !== IN_MEMORY) {
    // Ensure data directory exists
    mkdirSync(dirname(filePath), { recursive: true });
  }

  sqlite = new Database(filePath);

  // Enable WAL mode for better concurrent access
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS chatrooms (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      is_private INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      chatroom_id TEXT NOT NULL REFERENCES chatrooms(id) ON DELETE CASCADE,
      sender_id TEXT NOT NULL,
      content TEXT NOT NULL,
      is_edited INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_messages_chatroom_id ON messages(chatroom_id, id);
  `);

  db = drizzle(sqlite, { schema });
  return db;
}

/**
 * Gets the database instance.
 * Throws if database is not initialized.
 */
export function getDatabase(): DrizzleDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase first.');
  }
  return db;
}

/**
 * Closes the database connection.
 */
export function closeDatabase(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = null;
    db = null;
  }
}
