/**
 * Timeout-bounded acquisition of named locks with stale-lock recovery.
 *
 * Turns the LockStore's single-shot `tryCreate` into a polling acquire. A lock
 * whose recorded owner is no longer running is removed and retried at once;
 * a lock held by a live process is waited on until the deadline. Staleness is
 * decided by process liveness only, never by the age of the entry.
 */

import type { AcquireResult, LockRecord, LockToken, OperationName } from '../types/lock.js';
import type { LogSink } from '../types/sinks.js';
import type { LockStore } from './lock_store.js';
import { nullLogSink } from './log.js';
import { sleep as defaultSleep, type Sleeper } from './time.js';

export const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface LockManagerOptions {
  store: LockStore;
  /** Sleep between attempts while a live process holds the lock */
  pollIntervalMs?: number;
  logger?: LogSink;
  /** Pid recorded in lock files; defaults to process.pid */
  pid?: number;
  sleep?: Sleeper;
  now?: () => number;
}

/**
 * Outcome of `withLock`: the callback's value, or why it never ran.
 */
export type WithLockResult<T> =
  | { status: 'acquired'; token: LockToken; value: T }
  | Exclude<AcquireResult, { status: 'acquired' }>;

export interface InspectedLock extends LockRecord {
  alive: boolean | null;
}

export class LockManager {
  readonly store: LockStore;
  private readonly pollIntervalMs: number;
  private readonly logger: LogSink;
  private readonly pid: number;
  private readonly sleep: Sleeper;
  private readonly now: () => number;
  /** Locks acquired through this instance and not yet released */
  private readonly held = new Map<OperationName, LockToken>();

  constructor(options: LockManagerOptions) {
    this.store = options.store;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger ?? nullLogSink;
    this.pid = options.pid ?? process.pid;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Acquires the lock for `operation`, waiting up to `timeoutMs`.
   *
   * A timed-out acquisition leaves the existing entry untouched.
   */
  async acquire(operation: OperationName, timeoutMs: number, signal?: AbortSignal): Promise<AcquireResult> {
    if (this.held.has(operation)) {
      throw new Error(`Lock '${operation}' is already held by this lock manager`);
    }

    const start = this.now();
    const reclaimed: number[] = [];
    let holderPid: number | null = null;

    this.logger.log('DEBUG', `Attempting to acquire lock for operation: ${operation}`, { operation, timeout_ms: timeoutMs });

    while (true) {
      if (signal?.aborted) {
        return { status: 'interrupted', waited_ms: this.now() - start };
      }

      if (await this.store.tryCreate(operation, this.pid)) {
        const token: LockToken = {
          operation,
          owner_pid: this.pid,
          acquired_at: new Date(this.now()).toISOString(),
        };
        this.held.set(operation, token);
        const waitedMs = this.now() - start;
        this.logger.log('DEBUG', `Lock acquired for operation: ${operation}`, { operation, waited_ms: waitedMs });
        return { status: 'acquired', token, waited_ms: waitedMs, reclaimed };
      }

      const record = await this.store.read(operation);
      if (record !== null) {
        holderPid = record.owner_pid;

        // A null pid means the holder is between create and write: treat as live.
        if (holderPid !== null && !this.store.isOwnerAlive(holderPid)) {
          if (await this.store.reclaim(record, this.pid)) {
            this.logger.log('WARN', `Removing stale lock (PID: ${holderPid})`, { operation, stale_pid: holderPid });
            reclaimed.push(holderPid);
            continue;
          }
          // Changed under us, or another process is reclaiming it: poll again.
        }
      }

      const elapsed = this.now() - start;
      if (elapsed >= timeoutMs) {
        this.logger.log('ERROR', `Timeout waiting for lock: ${operation}`, {
          operation,
          waited_ms: elapsed,
          holder_pid: holderPid,
        });
        return { status: 'timed_out', waited_ms: elapsed, holder_pid: holderPid };
      }

      this.logger.log('DEBUG', `Lock busy, waiting... (operation: ${operation})`, { operation, holder_pid: holderPid });
      await this.sleep(Math.min(this.pollIntervalMs, timeoutMs - elapsed), signal);
    }
  }

  /**
   * Releases the lock for `operation`. Must be called once per successful acquire.
   *
   * @throws {LockStoreError} If the lock file exists but cannot be removed
   */
  async release(operation: OperationName): Promise<void> {
    if (!this.held.has(operation)) {
      this.logger.log('WARN', `Releasing lock not recorded as held: ${operation}`, { operation });
    }
    await this.store.remove(operation);
    this.held.delete(operation);
    this.logger.log('DEBUG', `Lock released for operation: ${operation}`, { operation });
  }

  /**
   * Releases every lock held by this instance. All releases are attempted;
   * the first failure is rethrown afterwards.
   */
  async releaseAll(): Promise<void> {
    let firstError: unknown = null;
    for (const operation of [...this.held.keys()]) {
      try {
        await this.release(operation);
      } catch (error) {
        this.logger.log('ERROR', `Failed to release lock: ${operation}`, {
          operation,
          error: error instanceof Error ? error.message : String(error),
        });
        firstError ??= error;
      }
    }
    if (firstError !== null) {
      throw firstError;
    }
  }

  /**
   * Synchronous variant of releaseAll for `process.on('exit')` hooks.
   */
  releaseAllSync(): void {
    let firstError: unknown = null;
    for (const operation of [...this.held.keys()]) {
      try {
        this.store.removeSync(operation);
        this.held.delete(operation);
      } catch (error) {
        firstError ??= error;
      }
    }
    if (firstError !== null) {
      throw firstError;
    }
  }

  /**
   * Every lock entry in the store, with the liveness of its owner.
   * An entry without a readable pid reports `alive: null`.
   */
  async inspect(): Promise<InspectedLock[]> {
    const records = await this.store.list();
    return records.map((record) => ({
      ...record,
      alive: record.owner_pid === null ? null : this.store.isOwnerAlive(record.owner_pid),
    }));
  }

  /**
   * Removes every entry whose owner is confirmed dead, through the same
   * guarded `reclaim` as `acquire`. Returns the removed entries.
   */
  async reclaimStale(): Promise<LockRecord[]> {
    const removed: LockRecord[] = [];
    for (const record of await this.store.list()) {
      if (record.owner_pid === null || this.store.isOwnerAlive(record.owner_pid)) {
        continue;
      }
      if (await this.store.reclaim(record, this.pid)) {
        this.logger.log('WARN', `Removing stale lock (PID: ${record.owner_pid})`, {
          operation: record.operation,
          stale_pid: record.owner_pid,
        });
        removed.push(record);
      }
    }
    return removed;
  }

  isHeld(operation: OperationName): boolean {
    return this.held.has(operation);
  }

  heldLocks(): LockToken[] {
    return [...this.held.values()];
  }

  /**
   * Runs `fn` while holding the lock, releasing it on every exit path.
   */
  async withLock<T>(
    operation: OperationName,
    timeoutMs: number,
    fn: (token: LockToken) => Promise<T>,
    signal?: AbortSignal
  ): Promise<WithLockResult<T>> {
    const acquired = await this.acquire(operation, timeoutMs, signal);
    if (acquired.status !== 'acquired') {
      return acquired;
    }
    try {
      const value = await fn(acquired.token);
      return { status: 'acquired', token: acquired.token, value };
    } finally {
      await this.release(operation);
    }
  }
}
