import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

/**
 * Initialize the state database schema.
 * Creates tables and indexes if they don't exist and records the schema version.
 */
export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS registrations (
      path TEXT PRIMARY KEY,
      source_locator TEXT NOT NULL,
      clone_path TEXT NOT NULL,
      source_marks_path TEXT NOT NULL,
      aggregate_marks_path TEXT NOT NULL,
      workspace_path TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS sync_lock (
      lock_name TEXT PRIMARY KEY,
      holder_pid INTEGER NOT NULL,
      acquired_at TEXT NOT NULL,
      expires_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS sync_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      path TEXT NOT NULL,
      direction TEXT NOT NULL,
      phase TEXT NOT NULL,
      status TEXT NOT NULL,
      error TEXT,
      started_at TEXT NOT NULL,
      finished_at TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_sync_runs_path ON sync_runs(path, id);
  `);

  db.prepare(
    `INSERT INTO meta (key, value) VALUES ('schema_version', ?)
     ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
  ).run(String(SCHEMA_VERSION));
}
