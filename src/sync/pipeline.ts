/**
 * Sync pipeline: streaming transfer between the stores and the per-call
 * phase machine.
 *
 * A transfer never buffers history in memory: the producer's stdout is piped
 * straight into the consumer's stdin. Both processes are awaited; the
 * consumer's exit status decides success, a failed producer fails the call
 * as well.
 */

import { pipeline } from 'node:stream/promises';
import type { RunJournal } from '../db/queries.js';
import { ExternalToolFailureError, NoMatchingBranchError, errorMessage } from '../errors.js';
import type { ErrorContext } from '../errors.js';
import { getLog } from '../logger.js';
import type { BranchPrefix, Direction, NormalizedPath, SyncPhase } from '../types.js';
import { isNamespaced } from './namespace.js';
import type { AggregateBranch, StreamingProcess } from './stores.js';

const log = getLog('pipeline');

// === Phase machine ===

const PHASE_ORDER: readonly SyncPhase[] = ['fetching', 'rewriting', 'streaming', 'materializing', 'done'];

/** Forward moves along PHASE_ORDER (skipping allowed) or into `aborted`. */
export function canTransition(from: SyncPhase, to: SyncPhase): boolean {
  if (from === 'done' || from === 'aborted') return false;
  if (to === 'aborted') return true;
  return PHASE_ORDER.indexOf(to) > PHASE_ORDER.indexOf(from);
}

/**
 * Tracks one sync call through its phases and mirrors every transition into
 * the run journal.
 */
export class RunTracker {
  private current: SyncPhase = 'fetching';
  readonly id: number;

  constructor(
    private readonly journal: RunJournal,
    readonly path: NormalizedPath,
    readonly direction: Direction,
    private readonly onAdvance: (phase: SyncPhase) => void = () => {},
  ) {
    this.id = journal.start(path, direction);
  }

  get phase(): SyncPhase {
    return this.current;
  }

  advance(next: SyncPhase): void {
    if (!canTransition(this.current, next)) {
      throw new Error(`Illegal sync phase transition ${this.current} -> ${next} for ${this.path}`);
    }
    log.debug({ path: this.path, from: this.current, to: next }, `Phase ${next}`);
    this.current = next;
    this.journal.advance(this.id, next);
    this.onAdvance(next);
  }

  succeed(): void {
    this.advance('done');
    this.journal.finish(this.id);
  }

  abort(error: unknown): void {
    if (this.current === 'done' || this.current === 'aborted') return;
    this.current = 'aborted';
    this.journal.finish(this.id, errorMessage(error));
  }
}

// === Transfer ===

export interface TransferContext {
  path: NormalizedPath;
  direction: Direction;
}

function toolContext(context: TransferContext, proc: StreamingProcess): ErrorContext {
  return { path: context.path, direction: context.direction, tool: proc.label, stderr: proc.stderrTail() };
}

function exitFailure(context: TransferContext, proc: StreamingProcess, code: number | null): ExternalToolFailureError {
  const how = code === null ? 'was terminated' : `exited with status ${code}`;
  const tail = proc.stderrTail();
  return new ExternalToolFailureError(
    `${proc.label} ${how} while syncing ${context.path}${tail ? `: ${tail}` : ''}`,
    'NON_ZERO_EXIT',
    { exitCode: code, context: toolContext(context, proc) },
  );
}

function spawnFailure(context: TransferContext, proc: StreamingProcess, cause: unknown): ExternalToolFailureError {
  if (cause instanceof ExternalToolFailureError) return cause;
  return new ExternalToolFailureError(`${proc.label} could not be started: ${errorMessage(cause)}`, 'SPAWN_FAILED', {
    cause,
    context: toolContext(context, proc),
  });
}

/**
 * Stream `producer` into `consumer` and wait for both to terminate.
 * A consumer that exits before the stream ends takes the producer down with it.
 */
export async function transfer(
  producer: StreamingProcess,
  consumer: StreamingProcess,
  context: TransferContext,
): Promise<void> {
  const source = producer.stdout;
  const sink = consumer.stdin;
  if (!source || !sink) {
    producer.kill();
    consumer.kill();
    await Promise.allSettled([producer.exited, consumer.exited]);
    throw new ExternalToolFailureError(
      `Cannot connect ${producer.label} to ${consumer.label}: missing stream`,
      'STREAM_FAILED',
      { context: { path: context.path, direction: context.direction } },
    );
  }

  log.debug({ ...context, producer: producer.label, consumer: consumer.label }, 'Transfer started');

  const piping = pipeline(source, sink).then(
    () => null,
    (error: unknown) => error,
  );
  const consumerExit = consumer.exited.then((code) => {
    if (code !== 0) producer.kill();
    return code;
  });
  const [piped, produced, consumed] = await Promise.allSettled([piping, producer.exited, consumerExit]);

  if (consumed.status === 'rejected') {
    producer.kill();
    throw spawnFailure(context, consumer, consumed.reason);
  }
  if (consumed.value !== 0) {
    throw exitFailure(context, consumer, consumed.value);
  }
  if (produced.status === 'rejected') {
    throw spawnFailure(context, producer, produced.reason);
  }
  if (produced.value !== 0) {
    throw exitFailure(context, producer, produced.value);
  }
  if (piped.status === 'fulfilled' && piped.value !== null) {
    throw new ExternalToolFailureError(
      `Stream from ${producer.label} to ${consumer.label} broke: ${errorMessage(piped.value)}`,
      'STREAM_FAILED',
      { cause: piped.value, context: { path: context.path, direction: context.direction } },
    );
  }

  log.debug({ ...context }, 'Transfer finished');
}

// === Reverse branch resolution ===

export interface BranchSelection {
  /** Explicit branch requested by the caller. */
  branch?: string;
}

/**
 * Pick the aggregate branch that feeds a reverse sync.
 *
 * Only branches under `prefix/` are candidates. An explicit branch must be
 * one of them; otherwise the current checkout branch wins when it is a
 * candidate, otherwise the only candidate.
 */
export function resolveAggregateBranch(
  branches: AggregateBranch[],
  prefix: BranchPrefix,
  selection: BranchSelection = {},
): string {
  const candidates = branches.filter((b) => isNamespaced(b.name, prefix));
  const names = candidates.map((b) => b.name).sort();

  if (selection.branch !== undefined) {
    if (names.includes(selection.branch)) return selection.branch;
    throw new NoMatchingBranchError(
      `Branch '${selection.branch}' is not in the ${prefix}/ namespace of the aggregate (candidates: ${names.join(', ') || 'none'})`,
      'BRANCH_NOT_IN_NAMESPACE',
      prefix,
      names,
    );
  }

  const current = candidates.find((b) => b.current);
  if (current) return current.name;

  if (candidates.length === 1) return candidates[0].name;

  if (candidates.length === 0) {
    throw new NoMatchingBranchError(`No aggregate branch starts with '${prefix}/'`, 'NO_BRANCH', prefix, names);
  }
  throw new NoMatchingBranchError(
    `Several aggregate branches match '${prefix}/' (${names.join(', ')}); pass --branch to choose one`,
    'AMBIGUOUS_BRANCH',
    prefix,
    names,
  );
}
