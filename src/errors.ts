/**
 * Error taxonomy for the sync engine.
 *
 * Every failure the core raises extends FitError, which carries a `code` for
 * programmatic handling, an optional `cause`, and a `context` record with the
 * subtree path, direction, tool and exit code where they are known.
 *
 * - InvalidConfigurationError: rejected before any external process runs
 * - ExternalToolFailureError: a clone/rewrite/export/import process failed
 * - NoMatchingBranchError: the aggregate has no (or no unique) branch for a subtree
 * - WorkspaceInconsistencyError: recoverable with the workspace repair procedure
 * - SyncBusyError: another live process holds the aggregate lock
 */

export type FitErrorKind =
  | 'InvalidConfiguration'
  | 'ExternalToolFailure'
  | 'NoMatchingBranch'
  | 'WorkspaceInconsistency'
  | 'SyncBusy';

export type InvalidConfigurationCode =
  | 'INVALID_PATH'
  | 'EMPTY_LOCATOR'
  | 'LOCATOR_NOT_FOUND'
  | 'ALREADY_REGISTERED'
  | 'DUPLICATE_IDENTIFIER'
  | 'NOT_REGISTERED'
  | 'NOT_INITIALIZED'
  | 'INVALID_OPTION';

export type ExternalToolFailureCode =
  | 'NON_ZERO_EXIT'
  | 'SPAWN_FAILED'
  | 'STREAM_FAILED'
  | 'MARKS_REWRITTEN';

export type NoMatchingBranchCode = 'NO_BRANCH' | 'AMBIGUOUS_BRANCH' | 'BRANCH_NOT_IN_NAMESPACE';

export type ErrorContext = Record<string, string | number | string[] | null | undefined>;

export class FitError extends Error {
  readonly kind: FitErrorKind;
  readonly code: string;
  readonly context: ErrorContext;

  constructor(
    kind: FitErrorKind,
    message: string,
    code: string,
    options?: { cause?: unknown; context?: ErrorContext },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'FitError';
    this.kind = kind;
    this.code = code;
    this.context = options?.context ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export class InvalidConfigurationError extends FitError {
  constructor(message: string, code: InvalidConfigurationCode, context?: ErrorContext) {
    super('InvalidConfiguration', message, code, { context });
    this.name = 'InvalidConfigurationError';
  }
}

export class ExternalToolFailureError extends FitError {
  /** Exit code of the failing process; null when it never started or was killed. */
  readonly exitCode: number | null;

  constructor(
    message: string,
    code: ExternalToolFailureCode,
    options: { exitCode?: number | null; cause?: unknown; context?: ErrorContext } = {},
  ) {
    super('ExternalToolFailure', message, code, {
      cause: options.cause,
      context: { ...options.context, exitCode: options.exitCode ?? null },
    });
    this.name = 'ExternalToolFailureError';
    this.exitCode = options.exitCode ?? null;
  }
}

export class NoMatchingBranchError extends FitError {
  readonly candidates: string[];

  constructor(message: string, code: NoMatchingBranchCode, prefix: string, candidates: string[]) {
    super('NoMatchingBranch', message, code, {
      context: { prefix, candidates },
    });
    this.name = 'NoMatchingBranchError';
    this.candidates = candidates;
  }
}

export class WorkspaceInconsistencyError extends FitError {
  readonly paths: string[];

  constructor(message: string, code: 'MISSING_POINTER' | 'UNTRACKED_TRACKED', paths: string[] = []) {
    super('WorkspaceInconsistency', message, code, { context: { paths } });
    this.name = 'WorkspaceInconsistencyError';
    this.paths = paths;
  }
}

export class SyncBusyError extends FitError {
  constructor(lockName: string, holderPid: number) {
    super('SyncBusy', `Another process (pid ${holderPid}) is syncing ${lockName}. Try again shortly.`, 'LOCK_HELD', {
      context: { lockName, holderPid },
    });
    this.name = 'SyncBusyError';
  }
}

/** Render any thrown value as a one-line message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
