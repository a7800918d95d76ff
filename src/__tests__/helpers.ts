import { execFileSync } from 'node:child_process';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type Database from 'better-sqlite3';
import { resolveConfig } from '../config.js';
import type { FitConfig } from '../config.js';
import { closeDb, openDb } from '../db/connection.js';
import { SqliteMetaStore, SqliteRegistry, SqliteRunJournal } from '../db/queries.js';
import { SyncEngine } from '../sync/engine.js';
import { AggregateLock } from '../sync/lock.js';
import { FakeAggregateStore, FakeSourceStore, FakeWorkspaceBackend } from './fakes.js';

export interface TestProject {
  root: string;
  config: FitConfig;
  db: Database.Database;
  registry: SqliteRegistry;
  journal: SqliteRunJournal;
  source: FakeSourceStore;
  aggregate: FakeAggregateStore;
  workspace: FakeWorkspaceBackend;
  engine: SyncEngine;
  cleanup(): void;
}

/**
 * An engine over an in-memory state database and in-process stores,
 * rooted in a fresh temp directory (marks and clone dirs are real files).
 */
export function createTestProject(): TestProject {
  const root = mkdtempSync(join(tmpdir(), 'fit-test-'));
  const config = resolveConfig({ cwd: root }, {});
  const db = openDb(':memory:');
  const registry = new SqliteRegistry(db);
  const journal = new SqliteRunJournal(db);
  const source = new FakeSourceStore();
  const aggregate = new FakeAggregateStore(config.fossilRepo);
  const workspace = new FakeWorkspaceBackend();

  const engine = new SyncEngine({
    config,
    registry,
    journal,
    meta: new SqliteMetaStore(db),
    lock: new AggregateLock(db),
    source,
    aggregate,
    workspace,
  });

  return {
    root,
    config,
    db,
    registry,
    journal,
    source,
    aggregate,
    workspace,
    engine,
    cleanup: () => {
      closeDb(db);
      rmSync(root, { recursive: true, force: true });
    },
  };
}

/** Run git with a fixed identity, returning stdout. */
export function git(cwd: string, ...args: string[]): string {
  return execFileSync('git', ['-c', 'user.name=Test', '-c', 'user.email=test@example.com', ...args], {
    cwd,
    encoding: 'utf-8',
  });
}
