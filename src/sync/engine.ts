/**
 * Sync engine: the commands, composed from the namespace mapper, rewriter,
 * ledger, pipeline and workspace layer.
 *
 * All collaborators are injected: the registry, run journal and lock live in
 * the state database, the stores wrap the external tools. Nothing here reads
 * the process working directory; every location comes from the FitConfig.
 */

import { mkdirSync, rmSync } from 'node:fs';
import { basename, dirname, extname, join, resolve } from 'node:path';
import type { FitConfig } from '../config.js';
import type { MetaStore, NewRegistration, Registry, RunJournal } from '../db/queries.js';
import { InvalidConfigurationError } from '../errors.js';
import type { ErrorContext } from '../errors.js';
import { getLog, logError } from '../logger.js';
import type { Direction, MarksMode, NormalizedPath, SubtreeRegistration, SyncRun } from '../types.js';
import { assertAppendOnly, growth, marksArgs, pathsFor, pruneMarks, reset, snapshot } from './ledger.js';
import type { AggregateLock, LockLease } from './lock.js';
import { branchPrefix, isNamespaced, isUrlLocator, normalize, sanitize, validateSourceLocator } from './namespace.js';
import { RunTracker, resolveAggregateBranch, transfer } from './pipeline.js';
import { restoreHistory, rewriteHistory } from './rewrite.js';
import type { BranchOutcome } from './rewrite.js';
import type {
  AggregateBranch,
  AggregateStore,
  MarksFiles,
  SourceStore,
  StreamingProcess,
  WorkspaceBackend,
} from './stores.js';
import { inspectWorkspace, materializeWorkspace, repairWorkspace } from './workspace.js';

const log = getLog('engine');

export interface EngineDeps {
  config: FitConfig;
  registry: Registry;
  journal: RunJournal;
  meta: MetaStore;
  lock: AggregateLock;
  source: SourceStore;
  aggregate: AggregateStore;
  workspace: WorkspaceBackend;
}

export interface InitResult {
  projectName: string;
  created: boolean;
  opened: boolean;
}

export interface MarksGrowth {
  source: number;
  aggregate: number;
}

export interface ForwardSyncResult {
  registration: SubtreeRegistration;
  branches: BranchOutcome[];
  marksAdded: MarksGrowth;
  /** True when the workspace needed the repair procedure. */
  repaired: boolean;
}

export interface PushOptions {
  /** Aggregate branch to push; must carry the subtree's prefix. */
  branch?: string;
  /** Force-push to the source. */
  force?: boolean;
}

export interface PushResult {
  registration: SubtreeRegistration;
  aggregateBranch: string;
  published: string[];
  marksAdded: MarksGrowth;
}

export interface ListedSubtree {
  registration: SubtreeRegistration;
  lastRun: SyncRun | null;
}

const PROJECT_NAME_KEY = 'project_name';

// Preferred checkout branches after an import, in order.
const DEFAULT_BRANCHES = ['main', 'master', 'trunk'];

export class SyncEngine {
  constructor(private readonly deps: EngineDeps) {}

  // === init ===

  /** Create or open the aggregate store and record the project. */
  async init(): Promise<InitResult> {
    const { config, aggregate, meta } = this.deps;

    let created = false;
    if (!aggregate.exists()) {
      log.info(`Initializing aggregate repository ${aggregate.repoPath}`);
      await aggregate.init(config.fossilInitArgs);
      created = true;
    }

    let opened = false;
    if (!(await aggregate.isOpen(config.root))) {
      log.info(`Opening ${aggregate.repoPath} in ${config.root}`);
      await aggregate.open(config.root, config.fossilOpenArgs);
      opened = true;
    }

    mkdirSync(config.clonesDir, { recursive: true });
    mkdirSync(config.marksDir, { recursive: true });

    const projectName = meta.get(PROJECT_NAME_KEY) ?? basename(aggregate.repoPath, extname(aggregate.repoPath));
    meta.set(PROJECT_NAME_KEY, projectName);

    log.info({ created, opened }, `Project ${projectName} is ready`);
    return { projectName, created, opened };
  }

  // === import ===

  /** Register a source under `path` and run its first sync. */
  async importSource(locator: string, path: string): Promise<ForwardSyncResult> {
    const subtree = normalize(path);
    const sourceLocator = this.resolveLocator(locator);
    this.requireInitialized();

    if (this.deps.registry.get(subtree)) {
      throw new InvalidConfigurationError(`Subdirectory '${subtree}' is already imported`, 'ALREADY_REGISTERED', {
        path: subtree,
      });
    }

    const id = sanitize(subtree);
    const clash = this.deps.registry.list().find((r) => sanitize(r.path) === id || basename(r.clonePath) === id);
    if (clash) {
      throw new InvalidConfigurationError(
        `'${subtree}' and '${clash.path}' map to the same identifier '${id}'`,
        'DUPLICATE_IDENTIFIER',
        { path: subtree, existing: clash.path },
      );
    }

    const { config } = this.deps;
    const draft: NewRegistration = {
      path: subtree,
      sourceLocator,
      clonePath: join(config.clonesDir, id),
      sourceMarksPath: join(config.marksDir, `${id}_git.marks`),
      aggregateMarksPath: join(config.marksDir, `${id}_fossil.marks`),
      workspacePath: join(config.root, subtree),
    };
    const provisional: SubtreeRegistration = { ...draft, createdAt: '', updatedAt: '' };

    log.info(`Importing ${sourceLocator} into ${subtree}/`);
    const result = await this.syncForward(provisional, 'fresh', { force: false, switchCheckout: true });

    const registration = this.deps.registry.insert(draft);
    log.info(`Imported ${sourceLocator} into ${subtree}/`);
    return { ...result, registration };
  }

  // === update ===

  /** Re-fetch the source and transfer what is new since the last sync. */
  async update(path: string): Promise<ForwardSyncResult> {
    const registration = this.lookup(path);
    this.requireInitialized();

    log.info(`Updating ${registration.path} from ${registration.sourceLocator}`);
    const result = await this.syncForward(registration, 'resume', { force: true, switchCheckout: false });

    const updated =
      registration.workspacePath === null
        ? this.deps.registry.setWorkspacePath(registration.path, join(this.deps.config.root, registration.path))
        : registration;

    log.info(
      `Updated ${registration.path}: ${result.marksAdded.source} new source mark(s), ${result.marksAdded.aggregate} new aggregate mark(s)`,
    );
    return { ...result, registration: updated };
  }

  // === push ===

  /** Transfer aggregate commits of the subtree back to its source and publish them. */
  async push(path: string, options: PushOptions = {}): Promise<PushResult> {
    const registration = this.lookup(path);
    this.requireInitialized();

    const { config, source, aggregate } = this.deps;
    const prefix = branchPrefix(registration.path);
    const direction: Direction = 'aggregate-to-source';

    return this.withRun(registration, direction, async (run) => {
      await this.freshClone(registration);

      run.advance('rewriting');
      await rewriteHistory(source, registration.clonePath, registration.path, true);

      run.advance('streaming');
      await this.pruneUnreachable(registration, await source.listBranches(registration.clonePath));
      const before = snapshot(registration);
      const checkout = await aggregate.openTemporaryCheckout(config.fossilOpenArgs);
      let aggregateBranch: string;
      try {
        const view = (await aggregate.isOpen(config.root)) ? config.root : checkout.dir;
        aggregateBranch = resolveAggregateBranch(await aggregate.listBranches(view), prefix, {
          branch: options.branch,
        });
        log.info(`Pushing aggregate branch ${aggregateBranch} to ${registration.sourceLocator}`);
        await aggregate.selectBranch(checkout.dir, aggregateBranch);

        await this.stream(registration, direction, 'resume', (marks) => ({
          producer: aggregate.exportStream(checkout.dir, marks.producer),
          consumer: source.importStream(registration.clonePath, marks.consumer),
        }));
      } finally {
        await checkout.close();
      }

      // fossil export hands over every check-in the table lacks, trunk and
      // other subtrees included; only the namespace reaches the source
      const namespaced = (await source.listBranches(registration.clonePath)).filter((b) => isNamespaced(b, prefix));
      await this.pruneUnreachable(registration, namespaced);
      const marksAdded = growth(before, snapshot(registration));

      const published = await restoreHistory(source, registration.clonePath, registration.path, prefix);
      if (published.length > 0) {
        await source.publish(registration.clonePath, registration.sourceLocator, published, options.force ?? false);
      }

      log.info(`Pushed ${registration.path}: ${published.length} branch(es), ${marksAdded.source} new source mark(s)`);
      return { registration, aggregateBranch, published, marksAdded };
    });
  }

  // === reset-marks ===

  /** Delete both marks tables of a subtree. Returns the removed files. */
  resetMarks(path: string): string[] {
    return reset(this.lookup(path));
  }

  // === list ===

  list(): ListedSubtree[] {
    return this.deps.registry.list().map((registration) => ({
      registration,
      lastRun: this.deps.journal.last(registration.path),
    }));
  }

  // === fix-index ===

  /** Run the workspace repair procedure for a subtree. */
  async fixIndex(path: string): Promise<void> {
    const registration = this.lookup(path);
    await repairWorkspace(this.deps.workspace, {
      clonePath: registration.clonePath,
      workspacePath: this.workspacePathOf(registration),
      subtree: registration.path,
    });
  }

  // === internals ===

  private lookup(path: string): SubtreeRegistration {
    const subtree = normalize(path);
    const registration = this.deps.registry.get(subtree);
    if (!registration) {
      throw new InvalidConfigurationError(`Subdirectory '${subtree}' is not registered`, 'NOT_REGISTERED', {
        path: subtree,
      });
    }
    return registration;
  }

  private requireInitialized(): void {
    if (!this.deps.aggregate.exists() || this.deps.meta.get(PROJECT_NAME_KEY) === null) {
      throw new InvalidConfigurationError(
        `No fitrepo project in ${this.deps.config.root}; run 'fit init' first`,
        'NOT_INITIALIZED',
      );
    }
  }

  private resolveLocator(locator: string): string {
    const resolved = locator.trim() && !isUrlLocator(locator) ? resolve(this.deps.config.root, locator) : locator;
    const check = validateSourceLocator(resolved);
    if (check.kind === 'path' && !check.isRepository) {
      log.warn(`${resolved} has no .git directory; assuming a bare repository`);
    }
    return resolved;
  }

  private workspacePathOf(registration: SubtreeRegistration): string {
    return registration.workspacePath ?? join(this.deps.config.root, registration.path);
  }

  private async freshClone(registration: SubtreeRegistration): Promise<void> {
    rmSync(registration.clonePath, { recursive: true, force: true });
    mkdirSync(dirname(registration.clonePath), { recursive: true });
    log.debug(`Cloning ${registration.sourceLocator} into ${registration.clonePath}`);
    await this.deps.source.clone(registration.sourceLocator, registration.clonePath);
  }

  /**
   * Hold the aggregate lock and track one sync call through its phases.
   * The run is aborted (and the error rethrown) on any failure.
   */
  private async withRun<T>(
    registration: SubtreeRegistration,
    direction: Direction,
    body: (run: RunTracker) => Promise<T>,
  ): Promise<T> {
    return this.deps.lock.withLock(this.deps.aggregate.repoPath, async (lease: LockLease) => {
      const run = new RunTracker(this.deps.journal, registration.path, direction, () => lease.renew());
      try {
        const result = await body(run);
        run.succeed();
        return result;
      } catch (error) {
        run.abort(error);
        logError(log, error, `Sync of ${registration.path} (${direction}) aborted in phase ${run.phase}`);
        throw error;
      }
    });
  }

  /** Drop the marks whose source object is not reachable from `branches` of the clone. */
  private async pruneUnreachable(registration: SubtreeRegistration, branches: string[]): Promise<number[]> {
    const reachable = await this.deps.source.reachableObjects(registration.clonePath, branches);
    return pruneMarks(registration, (revision) => reachable.has(revision));
  }

  /** Wire the marks tables, run one transfer and verify the ledger. */
  private async stream(
    registration: SubtreeRegistration,
    direction: Direction,
    mode: MarksMode,
    start: (marks: { producer: MarksFiles; consumer: MarksFiles }) => {
      producer: StreamingProcess;
      consumer: StreamingProcess;
    },
  ): Promise<MarksGrowth> {
    const tables = pathsFor(registration, direction);
    mkdirSync(dirname(tables.producer.file), { recursive: true });
    mkdirSync(dirname(tables.consumer.file), { recursive: true });

    const context: ErrorContext = { path: registration.path, direction };
    const before = snapshot(registration);
    const { producer, consumer } = start({
      producer: marksArgs(tables.producer.file, mode),
      consumer: marksArgs(tables.consumer.file, mode),
    });
    await transfer(producer, consumer, { path: registration.path, direction });
    const after = snapshot(registration);

    if (mode === 'resume') {
      assertAppendOnly(before, after, context);
    }
    return growth(before, after);
  }

  private async syncForward(
    registration: SubtreeRegistration,
    mode: MarksMode,
    options: { force: boolean; switchCheckout: boolean },
  ): Promise<Omit<ForwardSyncResult, 'registration'>> {
    const { config, source, aggregate, workspace } = this.deps;
    const direction: Direction = 'source-to-aggregate';

    return this.withRun(registration, direction, async (run) => {
      await this.freshClone(registration);

      run.advance('rewriting');
      const branches = await rewriteHistory(source, registration.clonePath, registration.path, options.force);

      run.advance('streaming');
      if (mode === 'resume') {
        await this.pruneUnreachable(registration, await source.listBranches(registration.clonePath));
      }
      const marksAdded = await this.stream(registration, direction, mode, (marks) => ({
        producer: source.exportStream(registration.clonePath, marks.producer),
        consumer: aggregate.importStream(marks.consumer),
      }));

      run.advance('materializing');
      if (await aggregate.isOpen(config.root)) {
        await this.refreshCheckout(registration.path, options.switchCheckout);
      }

      const layout = {
        clonePath: registration.clonePath,
        workspacePath: this.workspacePathOf(registration),
        root: config.root,
        subtree: registration.path,
      };
      await materializeWorkspace(workspace, layout);

      let repaired = false;
      const problems = await inspectWorkspace(workspace, layout);
      if (problems.length > 0) {
        for (const problem of problems) {
          log.warn({ paths: problem.paths }, problem.message);
        }
        await repairWorkspace(workspace, layout);
        repaired = true;
      }

      return { branches, marksAdded, repaired };
    });
  }

  /**
   * Bring the aggregate checkout up to date with the subtree's branches.
   * Switching to the namespace only happens when asked (first import);
   * otherwise a checkout already on one of the subtree's branches is updated.
   */
  private async refreshCheckout(subtree: NormalizedPath, switchCheckout: boolean): Promise<void> {
    const { config, aggregate } = this.deps;
    const prefix = branchPrefix(subtree);
    const branches = await aggregate.listBranches(config.root);

    const target = pickCheckoutBranch(branches, prefix, switchCheckout);
    if (target === null) {
      if (switchCheckout) {
        log.warn(`No branches starting with '${prefix}/' were found; the checkout was not updated`);
      }
      return;
    }
    log.info(`Updating checkout to branch ${target}`);
    await aggregate.selectBranch(config.root, target);
  }
}

/**
 * Branch the aggregate checkout should move to after a forward sync,
 * or null to leave it where it is.
 */
export function pickCheckoutBranch(
  branches: AggregateBranch[],
  prefix: string,
  switchCheckout: boolean,
): string | null {
  const current = branches.find((b) => b.current);
  if (current && isNamespaced(current.name, prefix)) return current.name;
  if (!switchCheckout) return null;

  const candidates = branches.filter((b) => isNamespaced(b.name, prefix)).map((b) => b.name);
  for (const name of DEFAULT_BRANCHES) {
    if (candidates.includes(`${prefix}/${name}`)) return `${prefix}/${name}`;
  }
  return candidates.sort()[0] ?? null;
}
