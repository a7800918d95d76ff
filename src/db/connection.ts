import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { initSchema } from './schema.js';

/**
 * Open (and create if needed) the state database at the given path.
 * Pass ':memory:' for an isolated in-memory database.
 */
export function openDb(path: string): Database.Database {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path);

  // WAL lets `list` read while another process holds the sync lock
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('synchronous = NORMAL');
  // Wait up to 5s on SQLITE_BUSY instead of failing immediately
  // (two fit processes can share the same state database)
  db.pragma('busy_timeout = 5000');

  initSchema(db);

  return db;
}

/** Close the database connection (for clean shutdown). */
export function closeDb(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}
