/**
 * Aggregate lock: one sync writing to an aggregate store at a time.
 *
 * In-process, calls are chained on a promise queue per lock name. Across
 * processes, the holder is recorded in the `sync_lock` table of the shared
 * state database. A lock expires after its TTL and can be taken over when
 * the holder PID is dead; the holder renews it as its sync advances.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { SyncBusyError } from '../errors.js';
import { getLog } from '../logger.js';

const log = getLog('lock');

/** Default lock TTL in seconds. */
const LOCK_TTL_SECONDS = 900;

/** Check if a process with the given PID is alive. */
export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

const LockRowSchema = z.object({ holder_pid: z.number().int(), expires_at: z.string() });

export interface LockOptions {
  ttlSeconds?: number;
  pid?: number;
  isAlive?: (pid: number) => boolean;
}

/** Handle given to the task holding the lock. */
export interface LockLease {
  readonly name: string;
  /** Push the expiry forward. */
  renew(): void;
}

export class AggregateLock {
  private readonly queues = new Map<string, Promise<void>>();
  private readonly ttlSeconds: number;
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;

  constructor(
    private readonly db: Database.Database,
    options: LockOptions = {},
  ) {
    this.ttlSeconds = options.ttlSeconds ?? LOCK_TTL_SECONDS;
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isPidAlive;
  }

  /**
   * Try to acquire the cross-process lock.
   * Returns null on success, or the PID of the live process holding it.
   */
  tryAcquire(name: string): number | null {
    const now = new Date().toISOString();
    const expiresAt = this.expiry();

    const acquire = this.db.transaction((): number | null => {
      const existing = LockRowSchema.optional().parse(
        this.db.prepare('SELECT holder_pid, expires_at FROM sync_lock WHERE lock_name = ?').get(name),
      );

      if (!existing) {
        this.db
          .prepare('INSERT INTO sync_lock (lock_name, holder_pid, acquired_at, expires_at) VALUES (?, ?, ?, ?)')
          .run(name, this.pid, now, expiresAt);
        return null;
      }

      const expired = existing.expires_at < now;
      if (existing.holder_pid === this.pid || expired || !this.isAlive(existing.holder_pid)) {
        if (existing.holder_pid !== this.pid) {
          log.warn({ name, holder: existing.holder_pid, expired }, 'Taking over a stale sync lock');
        }
        this.db
          .prepare('UPDATE sync_lock SET holder_pid = ?, acquired_at = ?, expires_at = ? WHERE lock_name = ?')
          .run(this.pid, now, expiresAt, name);
        return null;
      }

      return existing.holder_pid;
    });

    return acquire();
  }

  /** Release the lock if this process holds it. */
  release(name: string): void {
    this.db.prepare('DELETE FROM sync_lock WHERE lock_name = ? AND holder_pid = ?').run(name, this.pid);
  }

  renew(name: string): void {
    this.db
      .prepare('UPDATE sync_lock SET expires_at = ? WHERE lock_name = ? AND holder_pid = ?')
      .run(this.expiry(), name, this.pid);
  }

  /**
   * Run `task` while holding `name`. Calls from this process queue up;
   * a lock held by another live process fails with SyncBusyError.
   */
  async withLock<T>(name: string, task: (lease: LockLease) => Promise<T>): Promise<T> {
    const previous = this.queues.get(name) ?? Promise.resolve();

    const operation = async (): Promise<T> => {
      const holder = this.tryAcquire(name);
      if (holder !== null) {
        throw new SyncBusyError(name, holder);
      }
      try {
        return await task({ name, renew: () => this.renew(name) });
      } finally {
        this.release(name);
      }
    };

    const run = previous.then(operation, operation);
    this.queues.set(
      name,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );
    return run;
  }

  private expiry(): string {
    return new Date(Date.now() + this.ttlSeconds * 1000).toISOString();
  }
}
