/**
 * Types describing command attempts and operation outcomes.
 */

import type { OutcomeCode } from '../constants/outcome_codes.js';
import type { OperationName } from './lock.js';

/**
 * An external command, executed without a shell.
 */
export interface CommandSpec {
  cmd: string;
  args: string[];
  cwd?: string;
}

/**
 * Classification of one attempt.
 */
export type AttemptStatus =
  | { kind: 'success' }
  | { kind: 'timeout' }
  | { kind: 'failure'; exit_code: number }
  | { kind: 'interrupted' };

/**
 * One execution of a protected command.
 */
export interface AttemptResult {
  /** Human-readable command line */
  command: string;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  status: AttemptStatus;
  /** Combined stdout and stderr, for diagnostics only */
  output: string;
}

/**
 * Immutable retry configuration for one call site.
 */
export interface RetryPolicy {
  maxAttempts: number;
  interAttemptDelayMs: number;
  perAttemptTimeoutMs: number;
  lockAcquireTimeoutMs: number;
}

export type RetryResult =
  | { status: 'succeeded'; attempts: number; last: AttemptResult }
  | { status: 'exhausted'; attempts: number; last: AttemptResult }
  | { status: 'interrupted'; attempts: number; last: AttemptResult | null };

/**
 * Result of one Atomic Operation, as reported to callers.
 */
export interface OperationOutcome {
  code: OutcomeCode;
  operation: OperationName;
  message: string;
  /** Attempts made while holding the lock (0 if never executed) */
  attempts: number;
  /** Classification of the final attempt, if any ran */
  last_status: AttemptStatus | null;
  /** Unmerged paths found after a merge */
  conflicts: string[];
  /** Non-fatal findings from pre-validation */
  warnings: string[];
  /** Follow-up operation composed after this one (tag -> push) */
  chained: OperationOutcome | null;
}
