import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type Database from 'better-sqlite3';
import { closeDb, openDb } from '../db/connection.js';
import { SqliteMetaStore, SqliteRegistry, SqliteRunJournal } from '../db/queries.js';
import type { NewRegistration } from '../db/queries.js';
import { SCHEMA_VERSION, initSchema } from '../db/schema.js';
import { SyncBusyError } from '../errors.js';
import { AggregateLock } from '../sync/lock.js';

let db: Database.Database;

beforeEach(() => {
  db = openDb(':memory:');
});

afterEach(() => {
  closeDb(db);
});

function draft(path: string): NewRegistration {
  const id = path.split('/').join('__');
  return {
    path,
    sourceLocator: `https://git.example.test/${id}.git`,
    clonePath: `/work/.fitrepo/git_clones/${id}`,
    sourceMarksPath: `/work/.fitrepo/marks/${id}_git.marks`,
    aggregateMarksPath: `/work/.fitrepo/marks/${id}_fossil.marks`,
    workspacePath: null,
  };
}

// === Registry ===

describe('SqliteRegistry', () => {
  it('should insert and read back a registration', () => {
    const registry = new SqliteRegistry(db);
    const inserted = registry.insert(draft('libs/foo'));

    expect(inserted.createdAt).toBe(inserted.updatedAt);
    expect(registry.get('libs/foo')).toEqual(inserted);
    expect(registry.get('libs/bar')).toBeNull();
  });

  it('should list registrations ordered by path', () => {
    const registry = new SqliteRegistry(db);
    registry.insert(draft('libs/foo'));
    registry.insert(draft('apps/bar'));

    expect(registry.list().map((r) => r.path)).toEqual(['apps/bar', 'libs/foo']);
  });

  it('should reject a duplicate path', () => {
    const registry = new SqliteRegistry(db);
    registry.insert(draft('libs/foo'));
    expect(() => registry.insert(draft('libs/foo'))).toThrow();
  });

  it('should backfill the workspace path', () => {
    const registry = new SqliteRegistry(db);
    registry.insert(draft('libs/foo'));

    const updated = registry.setWorkspacePath('libs/foo', '/work/libs/foo');

    expect(updated.workspacePath).toBe('/work/libs/foo');
    expect(registry.get('libs/foo')?.workspacePath).toBe('/work/libs/foo');
  });
});

// === Run journal ===

describe('SqliteRunJournal', () => {
  it('should return the latest run of a path', () => {
    const journal = new SqliteRunJournal(db);
    const first = journal.start('libs/foo', 'source-to-aggregate');
    journal.finish(first);
    const second = journal.start('libs/foo', 'aggregate-to-source');
    journal.advance(second, 'streaming');

    expect(journal.last('libs/foo')).toMatchObject({
      id: second,
      direction: 'aggregate-to-source',
      phase: 'streaming',
      status: 'running',
    });
    expect(journal.last('apps/bar')).toBeNull();
  });

  it('should mark a failed run as aborted', () => {
    const journal = new SqliteRunJournal(db);
    const id = journal.start('libs/foo', 'source-to-aggregate');
    journal.advance(id, 'rewriting');
    journal.finish(id, 'git-filter-repo failed');

    const run = journal.last('libs/foo');
    expect(run).toMatchObject({ phase: 'aborted', status: 'failed', error: 'git-filter-repo failed' });
    expect(run?.finishedAt).not.toBeNull();
  });
});

// === Meta ===

describe('SqliteMetaStore', () => {
  it('should record the schema version', () => {
    expect(SCHEMA_VERSION).toBe(1);
    expect(new SqliteMetaStore(db).get('schema_version')).toBe('1');
  });

  it('should create the registrations table with its workspace column', () => {
    initSchema(db);
    const columns = db
      .prepare('PRAGMA table_info(registrations)')
      .all()
      .map((column) => (typeof column === 'object' && column !== null && 'name' in column ? String(column.name) : ''));
    expect(columns).toEqual([
      'path',
      'source_locator',
      'clone_path',
      'source_marks_path',
      'aggregate_marks_path',
      'workspace_path',
      'created_at',
      'updated_at',
    ]);
  });

  it('should overwrite values', () => {
    const meta = new SqliteMetaStore(db);
    expect(meta.get('project_name')).toBeNull();
    meta.set('project_name', 'mono');
    meta.set('project_name', 'mono2');
    expect(meta.get('project_name')).toBe('mono2');
  });
});

describe('openDb', () => {
  it('should create the state file and its directory', () => {
    const dir = mkdtempSync(join(tmpdir(), 'fit-db-'));
    try {
      const file = join(dir, '.fitrepo', 'fitrepo.db');
      const fileDb = openDb(file);
      new SqliteMetaStore(fileDb).set('project_name', 'mono');
      closeDb(fileDb);

      const reopened = openDb(file);
      expect(new SqliteMetaStore(reopened).get('project_name')).toBe('mono');
      closeDb(reopened);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

// === Lock ===

describe('AggregateLock', () => {
  const NAME = '/work/fitrepo.fossil';

  it('should refuse a lock held by a live process', async () => {
    const holder = new AggregateLock(db, { pid: 1001, isAlive: () => true });
    const other = new AggregateLock(db, { pid: 1002, isAlive: () => true });

    expect(holder.tryAcquire(NAME)).toBeNull();
    expect(other.tryAcquire(NAME)).toBe(1001);
    await expect(other.withLock(NAME, async () => 'ran')).rejects.toThrow(SyncBusyError);

    holder.release(NAME);
    expect(await other.withLock(NAME, async () => 'ran')).toBe('ran');
  });

  it('should take over the lock of a dead process', () => {
    new AggregateLock(db, { pid: 1001, isAlive: () => true }).tryAcquire(NAME);
    const other = new AggregateLock(db, { pid: 1002, isAlive: () => false });

    expect(other.tryAcquire(NAME)).toBeNull();
  });

  it('should take over an expired lock', () => {
    new AggregateLock(db, { pid: 1001, ttlSeconds: -60 }).tryAcquire(NAME);
    const other = new AggregateLock(db, { pid: 1002, isAlive: () => true });

    expect(other.tryAcquire(NAME)).toBeNull();
  });

  it('should release the lock after the task, even when it fails', async () => {
    const lock = new AggregateLock(db, { pid: 1001 });
    const other = new AggregateLock(db, { pid: 1002, isAlive: () => true });

    await expect(
      lock.withLock(NAME, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(other.tryAcquire(NAME)).toBeNull();
  });

  it('should run tasks of one process one after another', async () => {
    const lock = new AggregateLock(db, { pid: 1001 });
    const events: string[] = [];
    const task = (label: string) => async () => {
      events.push(`${label} start`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push(`${label} end`);
      return label;
    };

    const results = await Promise.all([lock.withLock(NAME, task('a')), lock.withLock(NAME, task('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a start', 'a end', 'b start', 'b end']);
  });
});
