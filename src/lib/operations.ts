/**
 * Atomic git operations: validate, lock, run with retries, release.
 *
 * Each operation holds the lock named after its category (push, pull,
 * checkout, tag, merge) for the whole retry loop, so two tag creations
 * serialize against each other even for different tag names. The lock is
 * released on every path once acquired; validation failures never take it.
 */

import type { OutcomeCode } from '../constants/outcome_codes.js';
import type { OperationName } from '../types/lock.js';
import type { AttemptResult, CommandSpec, OperationOutcome, RetryPolicy, RetryResult } from '../types/outcome.js';
import type { AlertSeverity, AlertSink, LogSink } from '../types/sinks.js';
import type { CommandRunner } from './executor.js';
import type { RepositoryProbe } from './git.js';
import type { LockManager } from './lock_manager.js';
import { nullLogSink } from './log.js';
import { runWithRetry } from './retry.js';
import type { Sleeper } from './time.js';
import {
  isMergeStrategy,
  isPullStrategy,
  MERGE_STRATEGIES,
  PULL_STRATEGIES,
  validateBranchName,
  validateCommitish,
  validateRefName,
  validateRemoteName,
  validateTagName,
  type NameValidationResult,
  type PullStrategy,
} from './validation.js';

export interface AtomicOperationsOptions {
  locks: LockManager;
  runner: CommandRunner;
  probe: RepositoryProbe;
  /** Policy used by operations without an entry in `policies` */
  policy: RetryPolicy;
  policies?: Partial<Record<OperationName, RetryPolicy>>;
  gitCommand?: string;
  cwd?: string;
  defaultRemote?: string;
  /** Paths ignored by the uncommitted-changes warning */
  ignoreDirtyGlobs?: string[];
  logger?: LogSink;
  /** Receives alert-worthy outcomes; omit to disable alerting */
  alerts?: AlertSink;
  sleep?: Sleeper;
}

interface Cancellable {
  signal?: AbortSignal;
}

export interface PushOptions extends Cancellable {
  ref?: string;
  remote?: string;
  forceWithLease?: boolean;
}

export interface PullOptions extends Cancellable {
  remote?: string;
  /** Defaults to the current branch */
  branch?: string;
  strategy?: string;
}

export interface CheckoutOptions extends Cancellable {
  branch: string;
  create?: boolean;
  base?: string;
}

export interface TagOptions extends Cancellable {
  name: string;
  commit?: string;
  message?: string;
  /** Push the tag after creating it (default true) */
  push?: boolean;
  remote?: string;
}

export interface MergeOptions extends Cancellable {
  branch: string;
  strategy?: string;
  noFf?: boolean;
}

const ALERT_SEVERITY: Partial<Record<OutcomeCode, AlertSeverity>> = {
  CONFLICT_DETECTED: 'high',
  RETRIES_EXHAUSTED: 'medium',
  LOCK_TIMED_OUT: 'medium',
};

const PULL_FLAGS: Readonly<Record<PullStrategy, string>> = {
  merge: '--no-ff',
  rebase: '--rebase',
  'ff-only': '--ff-only',
};

function describeLast(last: AttemptResult | null): string {
  if (!last) return 'no attempt completed';
  switch (last.status.kind) {
    case 'success':
      return 'succeeded';
    case 'timeout':
      return 'last attempt timed out';
    case 'failure':
      return `last attempt exited with code ${last.status.exit_code}`;
    case 'interrupted':
      return 'last attempt was interrupted';
  }
}

interface ExecuteOptions extends Cancellable {
  shouldRetry?: (attempt: AttemptResult) => boolean;
  /** Runs under the lock after the retry loop; may turn the result into a conflict */
  inspect?: (result: RetryResult) => string[];
  warnings?: string[];
  context?: Record<string, unknown>;
}

export class AtomicOperations {
  private readonly locks: LockManager;
  private readonly runner: CommandRunner;
  private readonly probe: RepositoryProbe;
  private readonly policy: RetryPolicy;
  private readonly policies: Partial<Record<OperationName, RetryPolicy>>;
  private readonly gitCommand: string;
  private readonly cwd: string | undefined;
  private readonly defaultRemote: string;
  private readonly ignoreDirtyGlobs: string[];
  private readonly logger: LogSink;
  private readonly alerts: AlertSink | undefined;
  private readonly sleep: Sleeper | undefined;

  constructor(options: AtomicOperationsOptions) {
    this.locks = options.locks;
    this.runner = options.runner;
    this.probe = options.probe;
    this.policy = options.policy;
    this.policies = options.policies ?? {};
    this.gitCommand = options.gitCommand ?? 'git';
    this.cwd = options.cwd;
    this.defaultRemote = options.defaultRemote ?? 'origin';
    this.ignoreDirtyGlobs = options.ignoreDirtyGlobs ?? [];
    this.logger = options.logger ?? nullLogSink;
    this.alerts = options.alerts;
    this.sleep = options.sleep;
  }

  policyFor(operation: OperationName): RetryPolicy {
    return this.policies[operation] ?? this.policy;
  }

  /**
   * `git push [--force-with-lease] <remote> <ref>` under the `push` lock.
   */
  async push(options: PushOptions = {}): Promise<OperationOutcome> {
    const ref = options.ref ?? 'HEAD';
    const remote = options.remote ?? this.defaultRemote;

    const invalid = this.firstInvalid([validateRefName(ref), validateRemoteName(remote)]);
    if (invalid) return this.rejected('push', invalid.message);

    const args = ['push', ...(options.forceWithLease ? ['--force-with-lease'] : []), remote, ref];
    return this.execute('push', this.git(args), { signal: options.signal, context: { remote, ref } });
  }

  /**
   * `git pull --no-ff|--rebase|--ff-only <remote> <branch>` under the `pull` lock.
   */
  async pull(options: PullOptions = {}): Promise<OperationOutcome> {
    const remote = options.remote ?? this.defaultRemote;
    const strategy = options.strategy ?? 'merge';

    if (!isPullStrategy(strategy)) {
      return this.rejected('pull', `Invalid pull strategy: ${strategy} (expected one of ${PULL_STRATEGIES.join(', ')})`);
    }
    const remoteCheck = validateRemoteName(remote);
    if (!remoteCheck.ok) return this.rejected('pull', remoteCheck.message);

    const state = this.checkRepositoryState('pull');
    if (!state.ok) return this.rejected('pull', state.message);

    const branch = options.branch ?? this.probe.currentBranch();
    if (branch === null) {
      return this.rejected('pull', 'No branch given and HEAD is detached', state.warnings);
    }
    const branchCheck = validateBranchName(branch);
    if (!branchCheck.ok) return this.rejected('pull', branchCheck.message, state.warnings);

    return this.execute('pull', this.git(['pull', PULL_FLAGS[strategy], remote, branch]), {
      signal: options.signal,
      warnings: state.warnings,
      context: { remote, branch, strategy },
    });
  }

  /**
   * `git checkout [-b] <branch> [<base>]` under the `checkout` lock.
   */
  async checkout(options: CheckoutOptions): Promise<OperationOutcome> {
    const checks = [validateBranchName(options.branch)];
    if (options.base !== undefined) checks.push(validateCommitish(options.base));
    const invalid = this.firstInvalid(checks);
    if (invalid) return this.rejected('checkout', invalid.message);

    const args = options.create
      ? ['checkout', '-b', options.branch, ...(options.base !== undefined ? [options.base] : [])]
      : ['checkout', options.branch];
    return this.execute('checkout', this.git(args), { signal: options.signal, context: { branch: options.branch } });
  }

  /**
   * `git tag [-a -m <message>] <name> <commit>` under the `tag` lock, then
   * a separate push of `refs/tags/<name>` under the `push` lock.
   *
   * The chained push is validated together with the tag, before either lock.
   */
  async tag(options: TagOptions): Promise<OperationOutcome> {
    const commit = options.commit ?? 'HEAD';
    const checks = [validateTagName(options.name), validateCommitish(commit)];
    if (options.push !== false) {
      checks.push(validateRefName(`refs/tags/${options.name}`), validateRemoteName(options.remote ?? this.defaultRemote));
    } else if (options.remote !== undefined) {
      checks.push(validateRemoteName(options.remote));
    }
    const invalid = this.firstInvalid(checks);
    if (invalid) return this.rejected('tag', invalid.message);

    const annotate = options.message !== undefined ? ['-a', '-m', options.message] : [];
    const created = await this.execute('tag', this.git(['tag', ...annotate, options.name, commit]), {
      signal: options.signal,
      context: { tag: options.name, commit },
    });

    if (created.code !== 'SUCCEEDED' || options.push === false) {
      return created;
    }

    const pushed = await this.push({ ref: `refs/tags/${options.name}`, remote: options.remote, signal: options.signal });
    return {
      ...created,
      code: pushed.code,
      message: pushed.code === 'SUCCEEDED' ? `${created.message}; pushed refs/tags/${options.name}` : `Tag created but push failed: ${pushed.message}`,
      chained: pushed,
    };
  }

  /**
   * `git merge [--no-ff] --strategy=<s> <branch>` under the `merge` lock.
   *
   * Unmerged paths after the merge produce CONFLICT_DETECTED, and a failed
   * attempt that left conflicts is never retried.
   */
  async merge(options: MergeOptions): Promise<OperationOutcome> {
    const strategy = options.strategy ?? 'ort';
    if (!isMergeStrategy(strategy)) {
      return this.rejected('merge', `Invalid merge strategy: ${strategy} (expected one of ${MERGE_STRATEGIES.join(', ')})`);
    }
    const branchCheck = validateBranchName(options.branch);
    if (!branchCheck.ok) return this.rejected('merge', branchCheck.message);

    const state = this.checkRepositoryState('merge');
    if (!state.ok) return this.rejected('merge', state.message);

    const args = ['merge', ...(options.noFf === false ? [] : ['--no-ff']), `--strategy=${strategy}`, options.branch];
    return this.execute('merge', this.git(args), {
      signal: options.signal,
      warnings: state.warnings,
      context: { branch: options.branch, strategy },
      shouldRetry: () => this.probe.unmergedPaths().length === 0,
      inspect: (result) => (result.status === 'interrupted' ? [] : this.probe.unmergedPaths()),
    });
  }

  private git(args: string[]): CommandSpec {
    return { cmd: this.gitCommand, args, cwd: this.cwd };
  }

  private firstInvalid(results: NameValidationResult[]): { message: string } | null {
    for (const result of results) {
      if (!result.ok) return result;
    }
    return null;
  }

  /**
   * Repository checks run before pull and merge. Uncommitted changes only warn;
   * a missing repository or identity is fatal.
   */
  private checkRepositoryState(operation: OperationName): { ok: true; warnings: string[] } | { ok: false; message: string } {
    if (!this.probe.isRepository()) {
      return { ok: false, message: 'Not in a git repository' };
    }

    const warnings: string[] = [];
    const dirty = this.probe.dirtyState(this.ignoreDirtyGlobs);
    if (!dirty.clean) {
      const warning = `Working directory has uncommitted changes (${dirty.dirtyFiles.length} file(s))`;
      warnings.push(warning);
      this.logger.log('WARN', warning, { operation, files: dirty.dirtyFiles.slice(0, 20) });
    }

    const untracked = this.probe.untrackedCount();
    if (untracked > 0) {
      this.logger.log('DEBUG', `Found ${untracked} untracked files`, { operation });
    }

    const identity = this.probe.identity();
    if (!identity.name || !identity.email) {
      return { ok: false, message: 'Git user configuration missing (name/email)' };
    }

    return { ok: true, warnings };
  }

  private rejected(operation: OperationName, message: string, warnings: string[] = []): OperationOutcome {
    this.logger.log('ERROR', message, { operation, code: 'VALIDATION_FAILED' });
    return this.outcome('VALIDATION_FAILED', operation, message, { warnings });
  }

  private outcome(
    code: OutcomeCode,
    operation: OperationName,
    message: string,
    extra: Partial<Omit<OperationOutcome, 'code' | 'operation' | 'message'>> = {}
  ): OperationOutcome {
    return {
      code,
      operation,
      message,
      attempts: 0,
      last_status: null,
      conflicts: [],
      warnings: [],
      chained: null,
      ...extra,
    };
  }

  private async execute(operation: OperationName, command: CommandSpec, options: ExecuteOptions): Promise<OperationOutcome> {
    const policy = this.policyFor(operation);
    const warnings = options.warnings ?? [];
    this.logger.log('INFO', `Starting atomic git ${operation}`, { operation, ...options.context });

    const acquired = await this.locks.acquire(operation, policy.lockAcquireTimeoutMs, options.signal);
    if (acquired.status === 'timed_out') {
      const holder = acquired.holder_pid !== null ? ` (held by PID ${acquired.holder_pid})` : '';
      return this.finish(
        this.outcome('LOCK_TIMED_OUT', operation, `Timed out after ${acquired.waited_ms}ms waiting for the ${operation} lock${holder}`, { warnings })
      );
    }
    if (acquired.status === 'interrupted') {
      return this.finish(this.outcome('INTERRUPTED', operation, `Interrupted while waiting for the ${operation} lock`, { warnings }));
    }

    let outcome: OperationOutcome;
    try {
      const result = await runWithRetry(this.runner, command, policy, {
        logger: this.logger,
        signal: options.signal,
        sleep: this.sleep,
        shouldRetry: options.shouldRetry,
        context: { operation },
      });
      const conflicts = options.inspect ? options.inspect(result) : [];
      const extra = { attempts: result.attempts, last_status: result.last?.status ?? null, warnings };

      if (conflicts.length > 0) {
        outcome = this.outcome('CONFLICT_DETECTED', operation, `Merge conflicts detected in ${conflicts.length} file(s)`, {
          ...extra,
          conflicts,
        });
      } else if (result.status === 'succeeded') {
        outcome = this.outcome('SUCCEEDED', operation, `git ${operation} succeeded`, extra);
      } else if (result.status === 'interrupted') {
        outcome = this.outcome('INTERRUPTED', operation, `git ${operation} was interrupted`, extra);
      } else {
        outcome = this.outcome(
          'RETRIES_EXHAUSTED',
          operation,
          `git ${operation} failed after ${result.attempts} attempt(s): ${describeLast(result.last)}`,
          extra
        );
      }
    } finally {
      await this.locks.release(operation);
    }

    return this.finish(outcome);
  }

  /**
   * Logs the final outcome and forwards alert-worthy ones.
   */
  private async finish(outcome: OperationOutcome): Promise<OperationOutcome> {
    const level = outcome.code === 'SUCCEEDED' ? 'INFO' : 'ERROR';
    this.logger.log(level, outcome.message, { operation: outcome.operation, code: outcome.code, attempts: outcome.attempts });

    if (outcome.conflicts.length > 0) {
      for (const file of outcome.conflicts) {
        this.logger.log('ERROR', `  - ${file}`, { operation: outcome.operation });
      }
    }

    const severity = ALERT_SEVERITY[outcome.code];
    if (severity && this.alerts) {
      try {
        await this.alerts.notify(severity, `git ${outcome.operation}: ${outcome.code}`, outcome.message, {
          operation: outcome.operation,
          conflicts: outcome.conflicts,
        });
      } catch (error) {
        this.logger.log('ERROR', 'Alert delivery failed', {
          operation: outcome.operation,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return outcome;
  }
}
