/**
 * Wires the default collaborators for a loaded configuration.
 */

import type { GitlatchConfig } from '../types/config.js';
import type { AlertSink, LogSink } from '../types/sinks.js';
import { resolveRetryPolicies, resolveRetryPolicy } from './config.js';
import { ProcessCommandRunner, type CommandRunner } from './executor.js';
import { GitCliProbe, type RepositoryProbe } from './git.js';
import { LockManager } from './lock_manager.js';
import { FileLockStore } from './lock_store.js';
import { ConsoleLogSink, createLogAlertSink } from './log.js';
import { AtomicOperations } from './operations.js';

export interface RuntimeOptions {
  cwd?: string;
  logger?: LogSink;
  alerts?: AlertSink;
  runner?: CommandRunner;
  probe?: RepositoryProbe;
}

export interface Runtime {
  config: GitlatchConfig;
  logger: LogSink;
  store: FileLockStore;
  locks: LockManager;
  probe: RepositoryProbe;
  operations: AtomicOperations;
}

export function createRuntime(config: GitlatchConfig, options: RuntimeOptions = {}): Runtime {
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? new ConsoleLogSink(config.logging.level);
  const store = new FileLockStore(config.lock.directory);
  const locks = new LockManager({ store, pollIntervalMs: config.lock.poll_interval_ms, logger });
  const probe = options.probe ?? new GitCliProbe(cwd, config.git.command);
  const alerts = config.alerts.enabled ? (options.alerts ?? createLogAlertSink(logger)) : undefined;

  const operations = new AtomicOperations({
    locks,
    runner: options.runner ?? new ProcessCommandRunner(),
    probe,
    policy: resolveRetryPolicy(config),
    policies: resolveRetryPolicies(config),
    gitCommand: config.git.command,
    cwd,
    defaultRemote: config.git.default_remote,
    ignoreDirtyGlobs: config.git.ignore_dirty_globs,
    logger,
    alerts,
  });

  return { config, logger, store, locks, probe, operations };
}
