/**
 * Workspace isolation: a directory inside the aggregate checkout that
 * behaves like a standalone checkout of one subtree.
 *
 * The workspace holds only a metadata pointer to the source clone. The clone's
 * work tree is the aggregate root, so the tracked paths `<subtree>/…` resolve
 * to the files the aggregate checkout already has. An inclusion filter keeps
 * the source tool to the subtree and an exclusion list hides everything the
 * aggregate has beside it.
 */

import { WorkspaceInconsistencyError } from '../errors.js';
import { getLog } from '../logger.js';
import type { NormalizedPath } from '../types.js';
import type { WorkspaceBackend } from './stores.js';

const log = getLog('workspace');

export interface WorkspaceLayout {
  /** Source clone that owns the metadata. */
  clonePath: string;
  /** Directory the user works in (`<root>/<subtree>`). */
  workspacePath: string;
  /** Root of the aggregate checkout. */
  root: string;
  subtree: NormalizedPath;
}

/** Inclusion filter for a subtree. */
export function inclusionPatterns(subtree: NormalizedPath): string[] {
  return [`/${subtree}/`];
}

/**
 * Ignore rules that hide everything outside `subtree` while anything new
 * inside it still shows up: `a/b` →
 * `/*`, `!/a/`, `/a/*`, `!/a/b/`.
 */
export function exclusionPatterns(subtree: NormalizedPath): string[] {
  const patterns: string[] = [];
  let parent = '';
  for (const component of subtree.split('/')) {
    patterns.push(`${parent}/*`, `!${parent}/${component}/`);
    parent = `${parent}/${component}`;
  }
  return patterns;
}

/** Configure (or reconfigure) the workspace of a subtree. */
export async function materializeWorkspace(backend: WorkspaceBackend, layout: WorkspaceLayout): Promise<void> {
  const { clonePath, workspacePath, root, subtree } = layout;

  await backend.writeMetadataPointer(workspacePath, clonePath);
  await backend.setWorkTreeRoot(clonePath, root);
  await backend.setInclusionFilter(clonePath, inclusionPatterns(subtree));
  await backend.setFilterEnabled(clonePath, true);
  await backend.setExclusions(clonePath, exclusionPatterns(subtree));

  log.debug({ workspacePath, clonePath }, `Workspace ready at ${workspacePath}`);
}

/**
 * Check a workspace. Returns the inconsistencies found; an empty list means
 * the workspace is usable as is.
 */
export async function inspectWorkspace(
  backend: WorkspaceBackend,
  layout: Pick<WorkspaceLayout, 'workspacePath' | 'subtree'>,
): Promise<WorkspaceInconsistencyError[]> {
  const { workspacePath, subtree } = layout;

  const pointer = await backend.readMetadataPointer(workspacePath);
  if (pointer === null) {
    return [new WorkspaceInconsistencyError(`No metadata pointer in ${workspacePath}`, 'MISSING_POINTER')];
  }

  // Files that left the index show up as untracked, or as one `<subtree>/`
  // entry once git takes the pointer file for a nested repository.
  const indexed = new Set(await backend.indexedPaths(workspacePath, subtree));
  const lost = (await backend.trackedPaths(workspacePath, subtree)).filter((p) => !indexed.has(p));
  if (lost.length > 0) {
    return [
      new WorkspaceInconsistencyError(
        `${lost.length} tracked file(s) in ${subtree} are missing from the index`,
        'UNTRACKED_TRACKED',
        lost,
      ),
    ];
  }
  return [];
}

/**
 * Rebuild the workspace index against HEAD.
 *
 * The inclusion filter is lifted while the subtree is re-added and the index
 * reset, then put back exactly as it was. Running it twice is harmless.
 */
export async function repairWorkspace(
  backend: WorkspaceBackend,
  layout: Pick<WorkspaceLayout, 'clonePath' | 'workspacePath' | 'subtree'>,
): Promise<void> {
  const { clonePath, workspacePath, subtree } = layout;

  if ((await backend.readMetadataPointer(workspacePath)) === null) {
    throw new WorkspaceInconsistencyError(
      `No metadata pointer in ${workspacePath}; run update to recreate the workspace`,
      'MISSING_POINTER',
    );
  }

  const saved = (await backend.readInclusionFilter(clonePath)) ?? inclusionPatterns(subtree);

  await backend.setInclusionFilter(clonePath, ['/*']);
  await backend.setFilterEnabled(clonePath, false);
  try {
    await backend.forceAdd(workspacePath, subtree);
    await backend.resetIndex(workspacePath);
  } finally {
    await backend.setInclusionFilter(clonePath, saved);
    await backend.setFilterEnabled(clonePath, true);
  }
  await backend.disableUntrackedCache(clonePath);

  log.info({ workspacePath }, `Workspace index rebuilt for ${subtree}`);
}
