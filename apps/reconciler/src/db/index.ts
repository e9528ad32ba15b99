import Database from 'better-sqlite3';
import { readFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { dbLogger } from '../lib/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const BUSY_TIMEOUT_MS = 5000;

export type Db = Database.Database;

export function loadSchema(): string {
  return readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
}

/**
 * Open (creating if needed) the reconciler database and bring its schema
 * up to date. Pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string): Db {
  const inMemory = path === ':memory:';
  if (!inMemory) {
    const dbDir = dirname(path);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(path);

  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  db.exec(loadSchema());
  runMigrations(db);

  dbLogger.info({ path }, 'Database initialized');
  return db;
}

/**
 * Idempotent migrations for databases created by older schemas.
 */
export function runMigrations(database: Db): void {
  // Migration 1: compose override document per project
  const projectColumns = database.prepare<[], { name: string }>('PRAGMA table_info(projects)').all();
  const hasComposeOverride = projectColumns.some((col) => col.name === 'compose_override');
  if (!hasComposeOverride) {
    database.exec('ALTER TABLE projects ADD COLUMN compose_override TEXT');
    dbLogger.info('Migration: Added compose_override column to projects table');
  }
}

/**
 * Run a function within a database transaction.
 * If the function throws, the transaction is rolled back.
 */
export function runInTransaction<T>(db: Db, fn: () => T): T {
  return db.transaction(fn)();
}

/**
 * Read a system setting, creating it from `factory` on first use.
 */
export function getOrCreateSetting(db: Db, key: string, factory: () => string): string {
  const row = db.prepare<[string], { value: string }>('SELECT value FROM system_settings WHERE key = ?').get(key);
  if (row) {
    return row.value;
  }

  const value = factory();
  const now = new Date().toISOString();
  db.prepare('INSERT INTO system_settings (key, value, created_at, updated_at) VALUES (?, ?, ?, ?)').run(
    key,
    value,
    now,
    now
  );
  return value;
}
