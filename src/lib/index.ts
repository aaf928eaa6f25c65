/**
 * gitlatch library entry point.
 *
 * @example
 * ```typescript
 * import { loadConfig, createRuntime } from 'gitlatch';
 *
 * const { operations } = createRuntime(await loadConfig());
 * const outcome = await operations.push({ ref: 'main' });
 * ```
 */

export * from '../types/index.js';

export { OUTCOME_CODES, OUTCOME_EXIT_CODES, isValidOutcomeCode } from '../constants/outcome_codes.js';
export type { OutcomeCode } from '../constants/outcome_codes.js';

export { atomicWriteJson, atomicReadJson, AtomicFsError } from './fs.js';

export {
  loadConfig,
  findConfigFile,
  defaultConfig,
  defaultLockDirectory,
  mergeConfig,
  applyEnvOverrides,
  validateConfigFile,
  resolveRetryPolicy,
  resolveRetryPolicies,
  ConfigError,
  CONFIG_FILE_NAME,
} from './config.js';

export { FileLockStore, LockStoreError, isPidRunning, parseOwnerPid } from './lock_store.js';
export type { LockStore } from './lock_store.js';

export { LockManager, DEFAULT_POLL_INTERVAL_MS } from './lock_manager.js';
export type { LockManagerOptions, WithLockResult, InspectedLock } from './lock_manager.js';

export { ProcessCommandRunner, formatCommand, KILL_GRACE_MS, EXIT_COMMAND_NOT_FOUND } from './executor.js';
export type { CommandRunner } from './executor.js';

export { runWithRetry } from './retry.js';
export type { RunWithRetryOptions } from './retry.js';

export {
  validateBranchName,
  validateTagName,
  validateRemoteName,
  validateRefName,
  validateCommitish,
  PULL_STRATEGIES,
  MERGE_STRATEGIES,
} from './validation.js';
export type { NameValidationResult, NameRejection, PullStrategy, MergeStrategy } from './validation.js';

export { GitCliProbe, GitProbeError, parseGitStatusWithExclusions, parseUnmergedPaths } from './git.js';
export type { RepositoryProbe, RepositoryStatus, DirtyState, GitIdentity } from './git.js';

export { AtomicOperations } from './operations.js';
export type {
  AtomicOperationsOptions,
  PushOptions,
  PullOptions,
  CheckoutOptions,
  TagOptions,
  MergeOptions,
} from './operations.js';

export { ConsoleLogSink, nullLogSink, createLogAlertSink, formatLogLine } from './log.js';
export { installInterruptHandlers } from './interrupt.js';
export { createRuntime } from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
export { runDoctor } from './doctor.js';
export type { DoctorReport, DoctorCheck } from './doctor.js';
