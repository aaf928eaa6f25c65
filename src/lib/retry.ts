/**
 * Bounded retries around a CommandRunner.
 */

import type { AttemptResult, CommandSpec, RetryPolicy, RetryResult } from '../types/outcome.js';
import type { LogSink } from '../types/sinks.js';
import { formatCommand, type CommandRunner } from './executor.js';
import { nullLogSink } from './log.js';
import { sleep as defaultSleep, type Sleeper } from './time.js';

export interface RunWithRetryOptions {
  logger?: LogSink;
  signal?: AbortSignal;
  sleep?: Sleeper;
  /**
   * Called after each unsuccessful attempt that still has a successor.
   * Returning false gives up immediately (the failure is final).
   */
  shouldRetry?: (attempt: AttemptResult) => boolean | Promise<boolean>;
  /** Extra context attached to every log line */
  context?: Record<string, unknown>;
}

function describeStatus(attempt: AttemptResult): string {
  switch (attempt.status.kind) {
    case 'success':
      return 'succeeded';
    case 'timeout':
      return 'timed out';
    case 'failure':
      return `exited with code ${attempt.status.exit_code}`;
    case 'interrupted':
      return 'was interrupted';
  }
}

/**
 * Runs `command` up to `policy.maxAttempts` times.
 *
 * Stops at the first success. Between attempts sleeps
 * `policy.interAttemptDelayMs`. On exhaustion the result carries the final
 * attempt, not an aggregate of all of them.
 *
 * @example
 * ```typescript
 * const result = await runWithRetry(new ProcessCommandRunner(), { cmd: 'git', args: ['push'] }, policy);
 * if (result.status === 'exhausted') {
 *   console.error(result.last.status);
 * }
 * ```
 */
export async function runWithRetry(
  runner: CommandRunner,
  command: CommandSpec,
  policy: RetryPolicy,
  options: RunWithRetryOptions = {}
): Promise<RetryResult> {
  const logger = options.logger ?? nullLogSink;
  const pause = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let last: AttemptResult | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      return { status: 'interrupted', attempts: attempt - 1, last };
    }

    logger.log('DEBUG', `Executing (attempt ${attempt}/${maxAttempts}): ${formatCommand(command)}`, {
      ...options.context,
      attempt,
    });

    last = await runner.run(command, policy.perAttemptTimeoutMs, options.signal);

    if (last.status.kind === 'success') {
      logger.log('DEBUG', `Command executed successfully on attempt ${attempt}`, { ...options.context, attempt });
      return { status: 'succeeded', attempts: attempt, last };
    }
    if (last.status.kind === 'interrupted') {
      return { status: 'interrupted', attempts: attempt, last };
    }

    logger.log(attempt < maxAttempts ? 'WARN' : 'ERROR', `Command ${describeStatus(last)} on attempt ${attempt}/${maxAttempts}`, {
      ...options.context,
      attempt,
      command: last.command,
      output: last.output.trim().slice(-2000),
    });

    if (attempt === maxAttempts) {
      break;
    }
    if (options.shouldRetry && !(await options.shouldRetry(last))) {
      return { status: 'exhausted', attempts: attempt, last };
    }

    await pause(policy.interAttemptDelayMs, options.signal);
  }

  if (last === null) {
    throw new Error('runWithRetry finished without running the command');
  }
  return { status: 'exhausted', attempts: maxAttempts, last };
}
