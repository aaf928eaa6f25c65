/**
 * Single source of truth for operation outcome codes.
 *
 * SUCCEEDED: command ran to completion under the lock
 * VALIDATION_FAILED: rejected before any lock was taken
 * LOCK_TIMED_OUT: another live process held the lock for the whole wait
 * RETRIES_EXHAUSTED: every attempt failed or timed out
 * CONFLICT_DETECTED: merge left unmerged paths; needs a human
 * INTERRUPTED: aborted by SIGINT/SIGTERM
 */
export const OUTCOME_CODES = [
  'SUCCEEDED',
  'VALIDATION_FAILED',
  'LOCK_TIMED_OUT',
  'RETRIES_EXHAUSTED',
  'CONFLICT_DETECTED',
  'INTERRUPTED',
] as const;

export type OutcomeCode = typeof OUTCOME_CODES[number];

/**
 * Process exit code surfaced by the CLI for each outcome.
 */
export const OUTCOME_EXIT_CODES: Readonly<Record<OutcomeCode, number>> = {
  SUCCEEDED: 0,
  VALIDATION_FAILED: 2,
  LOCK_TIMED_OUT: 3,
  RETRIES_EXHAUSTED: 4,
  CONFLICT_DETECTED: 5,
  INTERRUPTED: 130,
};

const OUTCOME_CODES_SET: ReadonlySet<string> = new Set(OUTCOME_CODES);

export function isValidOutcomeCode(code: string): code is OutcomeCode {
  return OUTCOME_CODES_SET.has(code);
}
