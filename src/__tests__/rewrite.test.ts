import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { namespaceBranches, restoreHistory, rewriteHistory } from '../sync/rewrite.js';
import { GitSourceStore } from '../vcs/git.js';
import { FakeSourceStore, sampleSource } from './fakes.js';
import { git } from './helpers.js';

const URL = 'https://git.example.test/foo.git';
const CLONE = '/clones/libs__foo';

describe('rewrite with an in-process store', () => {
  let store: FakeSourceStore;
  let dir: string;
  let clonePath: string;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'fit-rewrite-'));
    clonePath = join(dir, CLONE);
    store = new FakeSourceStore();
    store.remotes.set(URL, sampleSource());
    await store.clone(URL, clonePath);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('relocates every file and namespaces every branch', async () => {
    const outcomes = await rewriteHistory(store, clonePath, 'libs/foo');

    expect(outcomes.map((o) => [o.branch, o.action])).toEqual([
      ['dev', 'renamed'],
      ['main', 'renamed'],
    ]);
    const repo = store.repo(clonePath);
    expect(repo.branchNames()).toEqual(['libs__foo/dev', 'libs__foo/main']);
    for (const commit of repo.commits.values()) {
      expect(Object.keys(commit.files).every((p) => p.startsWith('libs/foo/'))).toBe(true);
    }
  });

  it('gives the same revisions when the same input is rewritten again', async () => {
    await rewriteHistory(store, clonePath, 'libs/foo');
    const first = store.repo(clonePath).head('libs__foo/dev').id;

    await store.clone(URL, clonePath);
    await rewriteHistory(store, clonePath, 'libs/foo');

    expect(store.repo(clonePath).head('libs__foo/dev').id).toBe(first);
  });

  it('drops a branch whose namespaced twin already exists', async () => {
    const repo = store.repo(clonePath);
    repo.branches.set('libs__foo/main', repo.head('main').id);

    const outcomes = await namespaceBranches(store, clonePath, 'libs__foo');

    expect(outcomes).toEqual([
      { branch: 'dev', target: 'libs__foo/dev', action: 'renamed' },
      { branch: 'libs__foo/main', target: 'libs__foo/main', action: 'kept' },
      { branch: 'main', target: 'libs__foo/main', action: 'discarded' },
    ]);
    expect(repo.branchNames()).toEqual(['libs__foo/dev', 'libs__foo/main']);
  });

  it('never nests the prefix over repeated cycles', async () => {
    await namespaceBranches(store, clonePath, 'libs__foo');
    const second = await namespaceBranches(store, clonePath, 'libs__foo');

    expect(second.every((o) => o.action === 'kept')).toBe(true);
    expect(store.repo(clonePath).branchNames()).toEqual(['libs__foo/dev', 'libs__foo/main']);
  });

  it('skips a branch that cannot be renamed', async () => {
    store.failRenames.add('dev');

    const outcomes = await namespaceBranches(store, clonePath, 'libs__foo');

    expect(outcomes[0]).toMatchObject({ branch: 'dev', action: 'failed', error: 'cannot rename branch dev to libs__foo/dev' });
    expect(outcomes[1]).toMatchObject({ branch: 'main', action: 'renamed' });
    expect(store.repo(clonePath).branchNames()).toEqual(['dev', 'libs__foo/main']);
  });

  it('restores the original layout and branch names', async () => {
    const original = store.repo(clonePath).copy();
    await rewriteHistory(store, clonePath, 'libs/foo');

    const published = await restoreHistory(store, clonePath, 'libs/foo');

    expect(published).toEqual(['dev', 'main']);
    const repo = store.repo(clonePath);
    expect(repo.head('main').id).toBe(original.head('main').id);
    expect(repo.head('dev').id).toBe(original.head('dev').id);
  });
});

describe('branch handling on a real repository', () => {
  const store = new GitSourceStore();
  let repo: string;

  beforeEach(() => {
    repo = mkdtempSync(join(tmpdir(), 'fit-branches-'));
    git(repo, 'init', '-q');
    git(repo, 'symbolic-ref', 'HEAD', 'refs/heads/main');
    writeFileSync(join(repo, 'README.md'), '# foo\n');
    git(repo, 'add', '-A');
    git(repo, 'commit', '-q', '-m', 'initial');
    git(repo, 'branch', 'dev');
    git(repo, 'branch', 'libs__foo/dev');
  });

  afterEach(() => {
    rmSync(repo, { recursive: true, force: true });
  });

  it('lists and probes branches', async () => {
    expect(await store.listBranches(repo)).toEqual(['dev', 'libs__foo/dev', 'main']);
    expect(await store.branchExists(repo, 'libs__foo/dev')).toBe(true);
    expect(await store.branchExists(repo, 'libs__foo/main')).toBe(false);
  });

  it('namespaces branches, discarding the colliding one', async () => {
    const outcomes = await namespaceBranches(store, repo, 'libs__foo');

    expect(outcomes.map((o) => [o.branch, o.action])).toEqual([
      ['dev', 'discarded'],
      ['libs__foo/dev', 'kept'],
      ['main', 'renamed'],
    ]);
    expect(await store.listBranches(repo)).toEqual(['libs__foo/dev', 'libs__foo/main']);

    await namespaceBranches(store, repo, 'libs__foo');
    expect(await store.listBranches(repo)).toEqual(['libs__foo/dev', 'libs__foo/main']);
  });

  it('lists the objects the given branches reach', async () => {
    const emptyTree = git(repo, 'hash-object', '-w', '-t', 'tree', '/dev/null').trim();
    const orphan = git(repo, 'commit-tree', emptyTree, '-m', 'initial empty check-in').trim();
    git(repo, 'branch', 'trunk', orphan);
    const head = git(repo, 'rev-parse', 'main').trim();
    const blob = git(repo, 'rev-parse', 'main:README.md').trim();

    const reachable = await store.reachableObjects(repo, ['main', 'libs__foo/dev']);

    expect(reachable.has(head)).toBe(true);
    expect(reachable.has(blob)).toBe(true);
    expect(reachable.has(orphan)).toBe(false);
    expect(await store.reachableObjects(repo, [])).toEqual(new Set());
  });

  it('fails a rename onto an existing branch', async () => {
    await expect(store.renameBranch(repo, 'dev', 'main')).rejects.toMatchObject({ code: 'NON_ZERO_EXIT' });
  });
});
