// Database client (drizzle + better-sqlite3)
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { sql } from 'drizzle-orm';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import * as schema from './schema.js';

export { schema };

export type Db = BetterSQLite3Database<typeof schema>;

export function resolveDbPath(url: string): string {
  const path = url.replace(/^file:/, '');
  return path === ':memory:' ? path : resolve(path);
}

/** Open a database; `:memory:` (or `file::memory:`) gives a private in-process store. */
export function createDb(url: string): Db {
  const dbPath = resolveDbPath(url);
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  return drizzle(sqlite, { schema });
}

/** Create all tables if they don't exist */
export function migrateDb(db: Db): void {
  db.run(sql`CREATE TABLE IF NOT EXISTS asset_groups (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    sort_order INTEGER NOT NULL DEFAULT 0,
    remark TEXT NOT NULL DEFAULT '',
    parent_id INTEGER,
    created_at TEXT NOT NULL
  )`);

  db.run(sql`CREATE TABLE IF NOT EXISTS assets (
    name TEXT PRIMARY KEY,
    host TEXT NOT NULL,
    port INTEGER NOT NULL DEFAULT 22,
    username TEXT NOT NULL,
    password TEXT,
    private_key_path TEXT,
    description TEXT,
    group_id INTEGER,
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`);

  // Databases created before asset groups existed
  const assetColumns = db.all<{ name: string }>(sql`PRAGMA table_info(assets)`);
  if (!assetColumns.some(column => column.name === 'group_id')) {
    db.run(sql`ALTER TABLE assets ADD COLUMN group_id INTEGER`);
  }

  db.run(sql`CREATE TABLE IF NOT EXISTS sessions (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    messages TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`);

  db.run(sql`CREATE INDEX IF NOT EXISTS idx_sessions_updated_at ON sessions (updated_at)`);
}
