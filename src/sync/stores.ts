/**
 * The process boundary of the sync engine.
 *
 * The engine never runs git or fossil directly; it talks to a SourceStore
 * (the per-source history, git), an AggregateStore (the shared history,
 * Fossil) and a WorkspaceBackend (the path-scoping primitives of the source
 * store). The real implementations live in src/vcs/, the tests use
 * in-process fakes.
 */

import type { Readable, Writable } from 'node:stream';

/** A running export or import process with its stream end. */
export interface StreamingProcess {
  /** Human-readable tool name, e.g. `git fast-export`. */
  readonly label: string;
  /** Set on producers. */
  readonly stdout: Readable | null;
  /** Set on consumers. */
  readonly stdin: Writable | null;
  /**
   * Resolves with the exit code once the process has terminated (null when
   * it was killed by a signal). Rejects when the process could not start.
   */
  readonly exited: Promise<number | null>;
  /** Last lines the process wrote to stderr. */
  stderrTail(): string;
  kill(): void;
}

/** Marks files handed to one side of a transfer. */
export interface MarksFiles {
  /** Read before the transfer; null in fresh mode or when no table exists yet. */
  importMarks: string | null;
  /** Written (rewritten in full) when the process finishes. */
  exportMarks: string;
}

export interface SourceStore {
  /** Clone `locator` into the (absent or empty) directory `dest`. */
  clone(locator: string, dest: string): Promise<void>;
  /** Rewrite every commit so its paths are rooted at `subtree`. */
  relocate(clonePath: string, subtree: string, force: boolean): Promise<void>;
  /** Inverse of relocate: keep only `subtree` and move it back to the root. */
  restore(clonePath: string, subtree: string): Promise<void>;
  listBranches(clonePath: string): Promise<string[]>;
  branchExists(clonePath: string, branch: string): Promise<boolean>;
  renameBranch(clonePath: string, from: string, to: string): Promise<void>;
  deleteBranch(clonePath: string, branch: string): Promise<void>;
  /** Ids of the commits, trees and blobs reachable from `branches`. */
  reachableObjects(clonePath: string, branches: string[]): Promise<Set<string>>;
  exportStream(clonePath: string, marks: MarksFiles): StreamingProcess;
  importStream(clonePath: string, marks: MarksFiles): StreamingProcess;
  /** Push `branches` (and tags) from the clone back to `locator`. */
  publish(clonePath: string, locator: string, branches: string[], force: boolean): Promise<void>;
}

export interface AggregateBranch {
  name: string;
  current: boolean;
}

/** A private checkout of the aggregate, removed by `close()`. */
export interface TemporaryCheckout {
  readonly dir: string;
  close(): Promise<void>;
}

export interface AggregateStore {
  /** Absolute path of the aggregate repository file. */
  readonly repoPath: string;
  exists(): boolean;
  init(args: string[]): Promise<void>;
  /** True when `root` holds an open checkout. */
  isOpen(root: string): Promise<boolean>;
  open(root: string, args: string[]): Promise<void>;
  listBranches(root: string): Promise<AggregateBranch[]>;
  selectBranch(checkoutDir: string, branch: string): Promise<void>;
  openTemporaryCheckout(args: string[]): Promise<TemporaryCheckout>;
  importStream(marks: MarksFiles): StreamingProcess;
  exportStream(checkoutDir: string, marks: MarksFiles): StreamingProcess;
}

/**
 * Workspace configuration primitives of the source store.
 * `workspaceDir` is where the user works; `clonePath` owns the metadata.
 */
export interface WorkspaceBackend {
  writeMetadataPointer(workspaceDir: string, clonePath: string): Promise<void>;
  /** Metadata directory the workspace points at, or null without a pointer. */
  readMetadataPointer(workspaceDir: string): Promise<string | null>;
  setWorkTreeRoot(clonePath: string, root: string): Promise<void>;
  setInclusionFilter(clonePath: string, patterns: string[]): Promise<void>;
  readInclusionFilter(clonePath: string): Promise<string[] | null>;
  setFilterEnabled(clonePath: string, enabled: boolean): Promise<void>;
  setExclusions(clonePath: string, patterns: string[]): Promise<void>;
  disableUntrackedCache(clonePath: string): Promise<void>;
  /** Paths under `subtree` recorded at HEAD, relative to the work-tree root. */
  trackedPaths(workspaceDir: string, subtree: string): Promise<string[]>;
  /** Paths under `subtree` recorded in the index, relative to the work-tree root. */
  indexedPaths(workspaceDir: string, subtree: string): Promise<string[]>;
  forceAdd(workspaceDir: string, subtree: string): Promise<void>;
  resetIndex(workspaceDir: string): Promise<void>;
}
