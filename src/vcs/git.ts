/**
 * Git side of the sync: the source store and the workspace primitives.
 *
 * History relocation uses git-filter-repo; transfers use
 * git fast-export / git fast-import with marks files.
 */

import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import type { MarksFiles, SourceStore, StreamingProcess, WorkspaceBackend } from '../sync/stores.js';
import { probeTool, runTool, spawnStream } from './process.js';

function git(args: string[], cwd: string) {
  return runTool('git', args, { cwd });
}

function marksOptions(marks: MarksFiles): string[] {
  const args: string[] = [];
  if (marks.importMarks !== null) args.push(`--import-marks=${marks.importMarks}`);
  args.push(`--export-marks=${marks.exportMarks}`);
  return args;
}

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);
}

// === Source store ===

export class GitSourceStore implements SourceStore {
  async clone(locator: string, dest: string): Promise<void> {
    mkdirSync(dirname(dest), { recursive: true });
    // --no-local: a real copy, so filter-repo accepts it as a fresh clone
    await git(['clone', '--no-local', '--quiet', locator, dest], dirname(dest));
  }

  async relocate(clonePath: string, subtree: string, force: boolean): Promise<void> {
    const args = ['filter-repo', '--to-subdirectory-filter', subtree];
    if (force) args.push('--force');
    await git(args, clonePath);
  }

  async restore(clonePath: string, subtree: string): Promise<void> {
    await git(['filter-repo', '--subdirectory-filter', subtree, '--force'], clonePath);
  }

  async listBranches(clonePath: string): Promise<string[]> {
    const { stdout } = await git(['for-each-ref', '--format=%(refname)', 'refs/heads/'], clonePath);
    return lines(stdout).map((ref) => ref.replace(/^refs\/heads\//, ''));
  }

  branchExists(clonePath: string, branch: string): Promise<boolean> {
    return probeTool('git', ['show-ref', '--verify', '--quiet', `refs/heads/${branch}`], { cwd: clonePath });
  }

  async renameBranch(clonePath: string, from: string, to: string): Promise<void> {
    await git(['branch', '-m', from, to], clonePath);
  }

  async deleteBranch(clonePath: string, branch: string): Promise<void> {
    await git(['branch', '-D', branch], clonePath);
  }

  async reachableObjects(clonePath: string, branches: string[]): Promise<Set<string>> {
    if (branches.length === 0) return new Set();
    const refs = branches.map((b) => `refs/heads/${b}`);
    const { stdout } = await git(['rev-list', '--objects', ...refs, '--'], clonePath);
    // `<id>` for commits, `<id> <path>` for trees and blobs
    return new Set(lines(stdout).map((line) => line.split(' ', 1)[0]));
  }

  exportStream(clonePath: string, marks: MarksFiles): StreamingProcess {
    return spawnStream('git', ['fast-export', '--all', ...marksOptions(marks)], {
      cwd: clonePath,
      role: 'producer',
      label: 'git fast-export',
    });
  }

  importStream(clonePath: string, marks: MarksFiles): StreamingProcess {
    return spawnStream('git', ['fast-import', '--force', '--quiet', ...marksOptions(marks)], {
      cwd: clonePath,
      role: 'consumer',
      label: 'git fast-import',
    });
  }

  async publish(clonePath: string, locator: string, branches: string[], force: boolean): Promise<void> {
    const forceArgs = force ? ['--force'] : [];
    const refspecs = branches.map((b) => `refs/heads/${b}:refs/heads/${b}`);
    await git(['push', ...forceArgs, locator, ...refspecs], clonePath);
    await git(['push', ...forceArgs, locator, '--tags'], clonePath);
  }
}

// === Workspace primitives ===

const POINTER_RE = /^gitdir:\s*(.+)$/m;

function infoFile(clonePath: string, name: string): string {
  return join(clonePath, '.git', 'info', name);
}

function writeInfoFile(clonePath: string, name: string, content: string): void {
  const file = infoFile(clonePath, name);
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, content);
}

export class GitWorkspaceBackend implements WorkspaceBackend {
  async writeMetadataPointer(workspaceDir: string, clonePath: string): Promise<void> {
    mkdirSync(workspaceDir, { recursive: true });
    writeFileSync(join(workspaceDir, '.git'), `gitdir: ${resolve(clonePath, '.git')}\n`);
  }

  async readMetadataPointer(workspaceDir: string): Promise<string | null> {
    const pointer = join(workspaceDir, '.git');
    if (!existsSync(pointer) || !statSync(pointer).isFile()) return null;
    const match = POINTER_RE.exec(readFileSync(pointer, 'utf-8'));
    return match ? match[1].trim() : null;
  }

  async setWorkTreeRoot(clonePath: string, root: string): Promise<void> {
    await git(['config', 'core.worktree', resolve(root)], clonePath);
  }

  async setInclusionFilter(clonePath: string, patterns: string[]): Promise<void> {
    writeInfoFile(clonePath, 'sparse-checkout', `${patterns.join('\n')}\n`);
  }

  async readInclusionFilter(clonePath: string): Promise<string[] | null> {
    const file = infoFile(clonePath, 'sparse-checkout');
    if (!existsSync(file)) return null;
    return lines(readFileSync(file, 'utf-8'));
  }

  async setFilterEnabled(clonePath: string, enabled: boolean): Promise<void> {
    await git(['config', 'core.sparseCheckout', String(enabled)], clonePath);
  }

  async setExclusions(clonePath: string, patterns: string[]): Promise<void> {
    writeInfoFile(clonePath, 'exclude', `# everything outside the subtree\n${patterns.join('\n')}\n`);
  }

  async disableUntrackedCache(clonePath: string): Promise<void> {
    await git(['config', 'core.untrackedCache', 'false'], clonePath);
  }

  async trackedPaths(workspaceDir: string, subtree: string): Promise<string[]> {
    const { stdout } = await git(['ls-tree', '-r', '-z', '--name-only', '--full-tree', 'HEAD'], workspaceDir);
    return stdout.split('\0').filter((p) => p.startsWith(`${subtree}/`));
  }

  async indexedPaths(workspaceDir: string, subtree: string): Promise<string[]> {
    const { stdout } = await git(['ls-files', '-z', '--full-name', '--', `:(top)${subtree}`], workspaceDir);
    return stdout.split('\0').filter(Boolean);
  }

  async forceAdd(workspaceDir: string, subtree: string): Promise<void> {
    await git(['add', '--force', '--all', '--', `:(top)${subtree}`], workspaceDir);
  }

  async resetIndex(workspaceDir: string): Promise<void> {
    await git(['reset', '-q'], workspaceDir);
  }
}
