/**
 * Composition root: opens the state database and wires the engine to the
 * real stores. Tests build the same graph with in-process stores.
 */

import type Database from 'better-sqlite3';
import type { FitConfig } from './config.js';
import { closeDb, openDb } from './db/connection.js';
import { SqliteMetaStore, SqliteRegistry, SqliteRunJournal } from './db/queries.js';
import { SyncEngine } from './sync/engine.js';
import { AggregateLock } from './sync/lock.js';
import type { AggregateStore, SourceStore, WorkspaceBackend } from './sync/stores.js';
import { FossilAggregateStore } from './vcs/fossil.js';
import { GitSourceStore, GitWorkspaceBackend } from './vcs/git.js';

export interface Stores {
  source: SourceStore;
  aggregate: AggregateStore;
  workspace: WorkspaceBackend;
}

export interface Project {
  config: FitConfig;
  db: Database.Database;
  engine: SyncEngine;
  close(): void;
}

export function defaultStores(config: FitConfig): Stores {
  return {
    source: new GitSourceStore(),
    aggregate: new FossilAggregateStore(config.fossilRepo),
    workspace: new GitWorkspaceBackend(),
  };
}

/** Open the project rooted at `config.root`. */
export function openProject(config: FitConfig, stores: Stores = defaultStores(config)): Project {
  const db = openDb(config.stateDb);
  const engine = new SyncEngine({
    config,
    registry: new SqliteRegistry(db),
    journal: new SqliteRunJournal(db),
    meta: new SqliteMetaStore(db),
    lock: new AggregateLock(db),
    ...stores,
  });

  return {
    config,
    db,
    engine,
    close: () => closeDb(db),
  };
}
