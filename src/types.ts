// === Sync directions ===

export const DIRECTIONS = ['source-to-aggregate', 'aggregate-to-source'] as const;

export type Direction = (typeof DIRECTIONS)[number];

// === Store sides (one marks table each) ===

export const STORE_SIDES = ['source', 'aggregate'] as const;

export type StoreSide = (typeof STORE_SIDES)[number];

// === Sync phases ===

export const SYNC_PHASES = [
  'fetching',
  'rewriting',
  'streaming',
  'materializing',
  'done',
  'aborted',
] as const;

export type SyncPhase = (typeof SYNC_PHASES)[number];

export const RUN_STATUSES = ['running', 'succeeded', 'failed'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

/** `fresh` never reads existing marks; `resume` continues from them. */
export type MarksMode = 'fresh' | 'resume';

// === Path aliases ===

/** A subtree path that passed `normalize()`. */
export type NormalizedPath = string;

/** Branch-name prefix derived from a NormalizedPath. */
export type BranchPrefix = string;

/** Filesystem-safe identifier used for clone and marks file names. */
export type SafeIdentifier = string;

// === Interfaces ===

export interface SubtreeRegistration {
  path: NormalizedPath;
  sourceLocator: string;
  clonePath: string;
  /** Marks table written by the source store (git). */
  sourceMarksPath: string;
  /** Marks table written by the aggregate store (Fossil). */
  aggregateMarksPath: string;
  workspacePath: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface SyncRun {
  id: number;
  path: string;
  direction: Direction;
  phase: SyncPhase;
  status: RunStatus;
  error: string | null;
  startedAt: string;
  finishedAt: string | null;
}
