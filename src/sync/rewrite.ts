/**
 * History rewriting: relocation under the subtree and branch namespacing.
 *
 * Relocation is not idempotent, so it only ever runs on a pristine clone;
 * the engine re-clones before every cycle. The same clone is deterministic
 * across cycles: rewriting identical input yields identical revision ids,
 * which is what lets the marks tables carry over.
 */

import { errorMessage } from '../errors.js';
import { getLog } from '../logger.js';
import type { BranchPrefix, NormalizedPath } from '../types.js';
import { branchPrefix, isNamespaced } from './namespace.js';
import type { SourceStore } from './stores.js';

const log = getLog('rewrite');

export type BranchAction = 'renamed' | 'discarded' | 'kept' | 'failed';

export interface BranchOutcome {
  branch: string;
  /** Namespaced name the branch now lives under (or would have). */
  target: string;
  action: BranchAction;
  error?: string;
}

/** Rewrite every commit so its paths are rooted at `subtree`. */
export async function relocate(
  store: SourceStore,
  clonePath: string,
  subtree: NormalizedPath,
  force = false,
): Promise<void> {
  log.debug({ clonePath, subtree }, `Relocating history under ${subtree}/`);
  await store.relocate(clonePath, subtree, force);
}

/**
 * Move every branch into the `prefix/` namespace.
 *
 * A branch whose namespaced twin already exists is deleted, so repeated
 * cycles never produce `prefix/prefix/B`. Failures are logged and the branch
 * is skipped.
 */
export async function namespaceBranches(
  store: SourceStore,
  clonePath: string,
  prefix: BranchPrefix,
): Promise<BranchOutcome[]> {
  const outcomes: BranchOutcome[] = [];

  for (const branch of await store.listBranches(clonePath)) {
    if (isNamespaced(branch, prefix)) {
      outcomes.push({ branch, target: branch, action: 'kept' });
      continue;
    }

    const target = `${prefix}/${branch}`;
    try {
      if (await store.branchExists(clonePath, target)) {
        await store.deleteBranch(clonePath, branch);
        outcomes.push({ branch, target, action: 'discarded' });
      } else {
        await store.renameBranch(clonePath, branch, target);
        outcomes.push({ branch, target, action: 'renamed' });
      }
    } catch (error) {
      log.warn({ branch, target, err: error }, `Could not move branch ${branch} to ${target}; skipping it`);
      outcomes.push({ branch, target, action: 'failed', error: errorMessage(error) });
    }
  }

  return outcomes;
}

/** Relocate a pristine clone and namespace its branches. */
export async function rewriteHistory(
  store: SourceStore,
  clonePath: string,
  subtree: NormalizedPath,
  force = false,
): Promise<BranchOutcome[]> {
  await relocate(store, clonePath, subtree, force);
  const outcomes = await namespaceBranches(store, clonePath, branchPrefix(subtree));

  const renamed = outcomes.filter((o) => o.action === 'renamed').length;
  log.info({ subtree, renamed, total: outcomes.length }, `Rewrote history for ${subtree} (${renamed} branch(es) namespaced)`);
  return outcomes;
}

/**
 * Invert the rewrite before publishing: keep only the subtree at the root
 * and strip `prefix/` from the branches that carry it.
 * Returns the branch names to publish. Branches outside the namespace are
 * left alone and not returned.
 */
export async function restoreHistory(
  store: SourceStore,
  clonePath: string,
  subtree: NormalizedPath,
  prefix: BranchPrefix = branchPrefix(subtree),
): Promise<string[]> {
  await store.restore(clonePath, subtree);

  const published: string[] = [];
  for (const branch of await store.listBranches(clonePath)) {
    if (!isNamespaced(branch, prefix)) continue;

    const bare = branch.slice(prefix.length + 1);
    if (await store.branchExists(clonePath, bare)) {
      await store.deleteBranch(clonePath, bare);
    }
    await store.renameBranch(clonePath, branch, bare);
    published.push(bare);
  }

  log.debug({ subtree, published }, 'Restored source layout');
  return published;
}
