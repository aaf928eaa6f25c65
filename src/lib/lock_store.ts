/**
 * Filesystem-backed registry of named advisory locks.
 *
 * Each operation category maps to `<dir>/git-<operation>.lock`. The file is
 * created with O_CREAT|O_EXCL, so at most one process on the host can create
 * it; its content is the holder's pid as plain text.
 *
 * Removing another process's stale entry happens under a second exclusive
 * file, `<lock>.reclaim`, so the re-read and the unlink cannot interleave
 * with another reclaimer's unlink and create.
 */

import { mkdir, open, readFile, readdir, stat, unlink } from 'node:fs/promises';
import { unlinkSync } from 'node:fs';
import { join } from 'node:path';
import type { LockRecord, OperationName } from '../types/lock.js';
import { isOperationName } from '../types/lock.js';
import { hasErrnoCode } from './fs.js';

const LOCK_FILE_PATTERN = /^git-(.+)\.lock$/;

/**
 * Error thrown when the lock directory or a lock file cannot be accessed.
 */
export class LockStoreError extends Error {
  constructor(
    message: string,
    public readonly lockPath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LockStoreError';
  }
}

/**
 * Storage primitive used by the LockManager.
 */
export interface LockStore {
  /** Creates the lock entry iff it does not exist. Returns true if this call created it. */
  tryCreate(operation: OperationName, ownerPid: number): Promise<boolean>;
  /** Reads the current entry, or null when the lock is free. */
  read(operation: OperationName): Promise<LockRecord | null>;
  /** Removes the entry. Removing a missing entry is not an error. */
  remove(operation: OperationName): Promise<void>;
  /**
   * Removes the entry only if it still matches `expected` (same pid and
   * mtime), holding the reclaim guard for the check and the removal.
   * Returns false when the entry changed or another reclaimer holds the guard.
   */
  reclaim(expected: LockRecord, reclaimerPid: number): Promise<boolean>;
  /** Synchronous remove for process exit hooks. */
  removeSync(operation: OperationName): void;
  /** Whether a process with this pid exists on the host. */
  isOwnerAlive(ownerPid: number): boolean;
  /** Every lock entry currently present. */
  list(): Promise<LockRecord[]>;
  pathFor(operation: OperationName): string;
}

/**
 * Checks if a process with the given PID is currently running.
 *
 * Uses process.kill(pid, 0) which checks for process existence
 * without actually sending a signal.
 */
export function isPidRunning(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return hasErrnoCode(error, 'EPERM');
  }
}

/**
 * Parses lock file content into a pid, or null if it is not one.
 */
export function parseOwnerPid(content: string): number | null {
  const trimmed = content.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const pid = Number(trimmed);
  return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FileLockStore implements LockStore {
  constructor(public readonly directory: string) {}

  pathFor(operation: OperationName): string {
    return join(this.directory, `git-${operation}.lock`);
  }

  guardPathFor(operation: OperationName): string {
    return `${this.pathFor(operation)}.reclaim`;
  }

  async tryCreate(operation: OperationName, ownerPid: number): Promise<boolean> {
    const lockPath = this.pathFor(operation);

    try {
      await mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new LockStoreError(
        `Failed to create lock directory ${this.directory}: ${describe(error)}`,
        lockPath,
        error instanceof Error ? error : undefined
      );
    }

    let fileHandle: Awaited<ReturnType<typeof open>>;
    try {
      fileHandle = await open(lockPath, 'wx');
    } catch (error) {
      if (hasErrnoCode(error, 'EEXIST')) {
        return false;
      }
      throw new LockStoreError(
        `Failed to create lock file ${lockPath}: ${describe(error)}`,
        lockPath,
        error instanceof Error ? error : undefined
      );
    }

    try {
      await fileHandle.writeFile(`${ownerPid}\n`, 'utf-8');
      await fileHandle.sync();
      await fileHandle.close();
    } catch (error) {
      // We own the entry but could not record the pid; give it back.
      await fileHandle.close().catch(() => undefined);
      await this.remove(operation);
      throw new LockStoreError(
        `Failed to write owner pid to ${lockPath}: ${describe(error)}`,
        lockPath,
        error instanceof Error ? error : undefined
      );
    }

    return true;
  }

  async read(operation: OperationName): Promise<LockRecord | null> {
    const lockPath = this.pathFor(operation);
    try {
      const [content, stats] = await Promise.all([readFile(lockPath, 'utf-8'), stat(lockPath)]);
      return {
        operation,
        path: lockPath,
        owner_pid: parseOwnerPid(content),
        acquired_at: stats.mtime.toISOString(),
      };
    } catch (error) {
      if (hasErrnoCode(error, 'ENOENT')) {
        return null;
      }
      throw new LockStoreError(
        `Failed to read lock file ${lockPath}: ${describe(error)}`,
        lockPath,
        error instanceof Error ? error : undefined
      );
    }
  }

  async remove(operation: OperationName): Promise<void> {
    await this.unlinkIfPresent(this.pathFor(operation));
  }

  async reclaim(expected: LockRecord, reclaimerPid: number): Promise<boolean> {
    const guardPath = this.guardPathFor(expected.operation);
    if (!(await this.tryCreateGuard(guardPath, reclaimerPid))) {
      return false;
    }

    try {
      const current = await this.read(expected.operation);
      if (!current || current.owner_pid !== expected.owner_pid || current.acquired_at !== expected.acquired_at) {
        return false;
      }
      await this.remove(expected.operation);
      return true;
    } finally {
      await this.unlinkIfPresent(guardPath);
    }
  }

  /**
   * Creates the reclaim guard. A guard left by a dead reclaimer is removed
   * (if unchanged since it was read) and the caller tries again later.
   */
  private async tryCreateGuard(guardPath: string, reclaimerPid: number): Promise<boolean> {
    let fileHandle: Awaited<ReturnType<typeof open>>;
    try {
      fileHandle = await open(guardPath, 'wx');
    } catch (error) {
      if (!hasErrnoCode(error, 'EEXIST')) {
        throw new LockStoreError(
          `Failed to create reclaim guard ${guardPath}: ${describe(error)}`,
          guardPath,
          error instanceof Error ? error : undefined
        );
      }
      await this.clearDeadGuard(guardPath);
      return false;
    }

    try {
      await fileHandle.writeFile(`${reclaimerPid}\n`, 'utf-8');
      await fileHandle.close();
    } catch (error) {
      await fileHandle.close().catch(() => undefined);
      await this.unlinkIfPresent(guardPath);
      throw new LockStoreError(
        `Failed to write reclaimer pid to ${guardPath}: ${describe(error)}`,
        guardPath,
        error instanceof Error ? error : undefined
      );
    }
    return true;
  }

  private async clearDeadGuard(guardPath: string): Promise<void> {
    const readGuard = async (): Promise<{ pid: number | null; mtimeMs: number } | null> => {
      try {
        const [content, stats] = await Promise.all([readFile(guardPath, 'utf-8'), stat(guardPath)]);
        return { pid: parseOwnerPid(content), mtimeMs: stats.mtimeMs };
      } catch (error) {
        if (hasErrnoCode(error, 'ENOENT')) {
          return null;
        }
        throw new LockStoreError(
          `Failed to read reclaim guard ${guardPath}: ${describe(error)}`,
          guardPath,
          error instanceof Error ? error : undefined
        );
      }
    };

    const guard = await readGuard();
    // A null pid is a guard still being written.
    if (!guard || guard.pid === null || this.isOwnerAlive(guard.pid)) {
      return;
    }
    const again = await readGuard();
    if (again && again.pid === guard.pid && again.mtimeMs === guard.mtimeMs) {
      await this.unlinkIfPresent(guardPath);
    }
  }

  private async unlinkIfPresent(filePath: string): Promise<void> {
    try {
      await unlink(filePath);
    } catch (error) {
      if (hasErrnoCode(error, 'ENOENT')) {
        return;
      }
      throw new LockStoreError(
        `Failed to remove lock file ${filePath}: ${describe(error)}`,
        filePath,
        error instanceof Error ? error : undefined
      );
    }
  }

  removeSync(operation: OperationName): void {
    const lockPath = this.pathFor(operation);
    try {
      unlinkSync(lockPath);
    } catch (error) {
      if (hasErrnoCode(error, 'ENOENT')) {
        return;
      }
      throw new LockStoreError(
        `Failed to remove lock file ${lockPath}: ${describe(error)}`,
        lockPath,
        error instanceof Error ? error : undefined
      );
    }
  }

  isOwnerAlive(ownerPid: number): boolean {
    return isPidRunning(ownerPid);
  }

  async list(): Promise<LockRecord[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (hasErrnoCode(error, 'ENOENT')) {
        return [];
      }
      throw new LockStoreError(
        `Failed to list lock directory ${this.directory}: ${describe(error)}`,
        this.directory,
        error instanceof Error ? error : undefined
      );
    }

    const records: LockRecord[] = [];
    for (const name of names.sort()) {
      const match = LOCK_FILE_PATTERN.exec(name);
      if (!match || !isOperationName(match[1])) {
        continue;
      }
      const record = await this.read(match[1]);
      // Released between readdir and read
      if (record) {
        records.push(record);
      }
    }
    return records;
  }
}
