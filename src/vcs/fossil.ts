/**
 * Fossil side of the sync: the aggregate store.
 *
 * Forwarded arguments (`--fwd-fossil-init`, `--fwd-fossil-open`) are inserted
 * right after the subcommand, before positional arguments.
 */

import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { getLog, logError } from '../logger.js';
import type { AggregateBranch, AggregateStore, MarksFiles, StreamingProcess, TemporaryCheckout } from '../sync/stores.js';
import { runTool, spawnStream } from './process.js';

const log = getLog('fossil');

// Checkout database names, current and legacy.
const CHECKOUT_FILES = ['.fslckout', '_FOSSIL_'];

function fossil(args: string[], cwd: string) {
  return runTool('fossil', args, { cwd });
}

function marksOptions(marks: MarksFiles): string[] {
  const args: string[] = [];
  if (marks.importMarks !== null) args.push('--import-marks', marks.importMarks);
  args.push('--export-marks', marks.exportMarks);
  return args;
}

/** Parse `fossil branch list`; the current branch is marked with `*`. */
export function parseBranchList(output: string): AggregateBranch[] {
  const branches: AggregateBranch[] = [];
  for (const raw of output.split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    const current = line.startsWith('*');
    const name = current ? line.slice(1).trim() : line;
    if (name) branches.push({ name, current });
  }
  return branches;
}

export class FossilAggregateStore implements AggregateStore {
  readonly repoPath: string;

  constructor(repoPath: string) {
    this.repoPath = resolve(repoPath);
  }

  exists(): boolean {
    return existsSync(this.repoPath);
  }

  async init(args: string[]): Promise<void> {
    await fossil(['init', ...args, this.repoPath], dirname(this.repoPath));
  }

  async isOpen(root: string): Promise<boolean> {
    return CHECKOUT_FILES.some((name) => existsSync(join(root, name)));
  }

  async open(root: string, args: string[]): Promise<void> {
    await fossil(['open', ...args, this.repoPath], root);
  }

  async listBranches(root: string): Promise<AggregateBranch[]> {
    const { stdout } = await fossil(['branch', 'list'], root);
    return parseBranchList(stdout);
  }

  async selectBranch(checkoutDir: string, branch: string): Promise<void> {
    await fossil(['update', branch], checkoutDir);
  }

  async openTemporaryCheckout(args: string[]): Promise<TemporaryCheckout> {
    const dir = mkdtempSync(join(tmpdir(), 'fit-checkout-'));
    try {
      await fossil(['open', ...args, this.repoPath], dir);
    } catch (error) {
      rmSync(dir, { recursive: true, force: true });
      throw error;
    }

    return {
      dir,
      close: async () => {
        try {
          await fossil(['close', '--force'], dir);
        } catch (error) {
          logError(log, error, `Could not close temporary checkout ${dir}`);
        } finally {
          rmSync(dir, { recursive: true, force: true });
        }
      },
    };
  }

  importStream(marks: MarksFiles): StreamingProcess {
    return spawnStream('fossil', ['import', '--git', '--incremental', ...marksOptions(marks), this.repoPath], {
      cwd: dirname(this.repoPath),
      role: 'consumer',
      label: 'fossil import',
    });
  }

  exportStream(checkoutDir: string, marks: MarksFiles): StreamingProcess {
    return spawnStream('fossil', ['export', '--git', ...marksOptions(marks)], {
      cwd: checkoutDir,
      role: 'producer',
      label: 'fossil export',
    });
  }
}
