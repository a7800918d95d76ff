import type Database from 'better-sqlite3';
import { z } from 'zod';
import { DIRECTIONS, RUN_STATUSES, SYNC_PHASES } from '../types.js';
import type { Direction, NormalizedPath, SubtreeRegistration, SyncPhase, SyncRun } from '../types.js';

// === Row schemas ===

const RegistrationRowSchema = z.object({
  path: z.string().min(1),
  source_locator: z.string().min(1),
  clone_path: z.string().min(1),
  source_marks_path: z.string().min(1),
  aggregate_marks_path: z.string().min(1),
  workspace_path: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const SyncRunRowSchema = z.object({
  id: z.number().int(),
  path: z.string(),
  direction: z.enum(DIRECTIONS),
  phase: z.enum(SYNC_PHASES),
  status: z.enum(RUN_STATUSES),
  error: z.string().nullable(),
  started_at: z.string(),
  finished_at: z.string().nullable(),
});

function rowToRegistration(row: unknown): SubtreeRegistration {
  const r = RegistrationRowSchema.parse(row);
  return {
    path: r.path,
    sourceLocator: r.source_locator,
    clonePath: r.clone_path,
    sourceMarksPath: r.source_marks_path,
    aggregateMarksPath: r.aggregate_marks_path,
    workspacePath: r.workspace_path,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

function rowToRun(row: unknown): SyncRun {
  const r = SyncRunRowSchema.parse(row);
  return {
    id: r.id,
    path: r.path,
    direction: r.direction,
    phase: r.phase,
    status: r.status,
    error: r.error,
    startedAt: r.started_at,
    finishedAt: r.finished_at,
  };
}

// === Registry ===

export type NewRegistration = Omit<SubtreeRegistration, 'createdAt' | 'updatedAt'>;

/** Persistent mapping subtree path → registration record. */
export interface Registry {
  get(path: NormalizedPath): SubtreeRegistration | null;
  list(): SubtreeRegistration[];
  insert(registration: NewRegistration): SubtreeRegistration;
  setWorkspacePath(path: NormalizedPath, workspacePath: string): SubtreeRegistration;
}

export class SqliteRegistry implements Registry {
  constructor(private readonly db: Database.Database) {}

  get(path: NormalizedPath): SubtreeRegistration | null {
    const row = this.db.prepare('SELECT * FROM registrations WHERE path = ?').get(path);
    return row === undefined ? null : rowToRegistration(row);
  }

  list(): SubtreeRegistration[] {
    return this.db
      .prepare('SELECT * FROM registrations ORDER BY path')
      .all()
      .map(rowToRegistration);
  }

  insert(registration: NewRegistration): SubtreeRegistration {
    const now = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO registrations
           (path, source_locator, clone_path, source_marks_path, aggregate_marks_path, workspace_path, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        registration.path,
        registration.sourceLocator,
        registration.clonePath,
        registration.sourceMarksPath,
        registration.aggregateMarksPath,
        registration.workspacePath,
        now,
        now,
      );
    return { ...registration, createdAt: now, updatedAt: now };
  }

  setWorkspacePath(path: NormalizedPath, workspacePath: string): SubtreeRegistration {
    this.db
      .prepare('UPDATE registrations SET workspace_path = ?, updated_at = ? WHERE path = ?')
      .run(workspacePath, new Date().toISOString(), path);
    const updated = this.get(path);
    if (!updated) {
      throw new Error(`Registration disappeared while updating: ${path}`);
    }
    return updated;
  }
}

// === Run journal ===

/** Records one row per sync call as its phase machine advances. */
export interface RunJournal {
  start(path: NormalizedPath, direction: Direction): number;
  advance(id: number, phase: SyncPhase): void;
  finish(id: number, error?: string): void;
  last(path: NormalizedPath): SyncRun | null;
}

export class SqliteRunJournal implements RunJournal {
  constructor(private readonly db: Database.Database) {}

  start(path: NormalizedPath, direction: Direction): number {
    const result = this.db
      .prepare(
        `INSERT INTO sync_runs (path, direction, phase, status, error, started_at, finished_at)
         VALUES (?, ?, 'fetching', 'running', NULL, ?, NULL)`,
      )
      .run(path, direction, new Date().toISOString());
    return Number(result.lastInsertRowid);
  }

  advance(id: number, phase: SyncPhase): void {
    this.db.prepare('UPDATE sync_runs SET phase = ? WHERE id = ?').run(phase, id);
  }

  finish(id: number, error?: string): void {
    this.db
      .prepare(
        `UPDATE sync_runs
         SET status = ?, phase = CASE WHEN ? IS NULL THEN phase ELSE 'aborted' END, error = ?, finished_at = ?
         WHERE id = ?`,
      )
      .run(error === undefined ? 'succeeded' : 'failed', error ?? null, error ?? null, new Date().toISOString(), id);
  }

  last(path: NormalizedPath): SyncRun | null {
    const row = this.db.prepare('SELECT * FROM sync_runs WHERE path = ? ORDER BY id DESC LIMIT 1').get(path);
    return row === undefined ? null : rowToRun(row);
  }
}

// === Project metadata ===

/** Key/value metadata of the project (name, schema version). */
export interface MetaStore {
  get(key: string): string | null;
  set(key: string, value: string): void;
}

const MetaRowSchema = z.object({ value: z.string() });

export class SqliteMetaStore implements MetaStore {
  constructor(private readonly db: Database.Database) {}

  get(key: string): string | null {
    const row = this.db.prepare('SELECT value FROM meta WHERE key = ?').get(key);
    return row === undefined ? null : MetaRowSchema.parse(row).value;
  }

  set(key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO meta (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
      )
      .run(key, value);
  }
}
