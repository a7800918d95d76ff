/**
 * Sync core: merges git histories into a Fossil aggregate under namespaced
 * subtrees and keeps both sides in step through persisted marks tables.
 *
 * The core never spawns a tool itself; it drives the SourceStore,
 * AggregateStore and WorkspaceBackend interfaces (see src/vcs/ for the
 * git and fossil implementations).
 */

export { SyncEngine, pickCheckoutBranch } from './engine.js';
export type {
  EngineDeps,
  ForwardSyncResult,
  InitResult,
  ListedSubtree,
  MarksGrowth,
  PushOptions,
  PushResult,
} from './engine.js';
export {
  PREFIX_DELIMITER,
  branchPrefix,
  isNamespaced,
  isUrlLocator,
  normalize,
  prefixToPath,
  sanitize,
  validateSourceLocator,
} from './namespace.js';
export type { LocatorCheck } from './namespace.js';
export { namespaceBranches, relocate, restoreHistory, rewriteHistory } from './rewrite.js';
export type { BranchAction, BranchOutcome } from './rewrite.js';
export {
  assertAppendOnly,
  growth,
  loadMarks,
  marksArgs,
  marksFile,
  parseMarks,
  pathsFor,
  reset,
  snapshot,
} from './ledger.js';
export type { LedgerSnapshot, MarkTable, MarkTableLocation, MarkTableRef } from './ledger.js';
export { RunTracker, canTransition, resolveAggregateBranch, transfer } from './pipeline.js';
export type { BranchSelection, TransferContext } from './pipeline.js';
export {
  exclusionPatterns,
  inclusionPatterns,
  inspectWorkspace,
  materializeWorkspace,
  repairWorkspace,
} from './workspace.js';
export type { WorkspaceLayout } from './workspace.js';
export { AggregateLock, isPidAlive } from './lock.js';
export type { LockLease, LockOptions } from './lock.js';
export type {
  AggregateBranch,
  AggregateStore,
  MarksFiles,
  SourceStore,
  StreamingProcess,
  TemporaryCheckout,
  WorkspaceBackend,
} from './stores.js';
