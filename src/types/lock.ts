/**
 * Lock mechanism type definitions.
 *
 * A lock is one file per operation category; the file's existence is the
 * lock and its content is the pid of the holder.
 */

/**
 * Fixed vocabulary of lockable operation categories.
 */
export const OPERATION_NAMES = ['push', 'pull', 'checkout', 'tag', 'merge'] as const;

export type OperationName = typeof OPERATION_NAMES[number];

const OPERATION_NAMES_SET: ReadonlySet<string> = new Set(OPERATION_NAMES);

export function isOperationName(value: string): value is OperationName {
  return OPERATION_NAMES_SET.has(value);
}

/**
 * Exclusive ownership of one operation category.
 */
export interface LockToken {
  operation: OperationName;
  /** Process ID that holds the lock */
  owner_pid: number;
  /** ISO timestamp when the lock was acquired */
  acquired_at: string;
}

/**
 * What a reader observes in an existing lock file.
 *
 * `owner_pid` is null when the file is empty or does not hold a pid, which
 * happens while another process is between create and write.
 */
export interface LockRecord {
  operation: OperationName;
  path: string;
  owner_pid: number | null;
  /** File modification time, ISO formatted */
  acquired_at: string | null;
}

/**
 * Result of a timeout-bounded acquisition.
 */
export type AcquireResult =
  | { status: 'acquired'; token: LockToken; waited_ms: number; reclaimed: number[] }
  | { status: 'timed_out'; waited_ms: number; holder_pid: number | null }
  | { status: 'interrupted'; waited_ms: number };
