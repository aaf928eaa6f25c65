/**
 * TypeScript interfaces for gitlatch.config.json.
 *
 * Every section is optional in the file itself; `loadConfig` fills the
 * defaults so the rest of the code only ever sees a complete GitlatchConfig.
 */

import type { LogLevel } from './sinks.js';
import type { OperationName } from './lock.js';

/**
 * Lock directory and acquisition settings.
 */
export interface LockConfig {
  /** Directory holding one `git-<operation>.lock` file per held lock */
  directory: string;
  /** How long an acquirer waits for a busy lock before giving up */
  acquire_timeout_seconds: number;
  /** Sleep between acquisition attempts while the lock is held by a live process */
  poll_interval_ms: number;
}

/**
 * Retry settings applied to every protected command.
 */
export interface RetryConfig {
  /** Total attempts, including the first one (1 disables retries) */
  max_attempts: number;
  /** Pause between two attempts */
  inter_attempt_delay_seconds: number;
  /** Wall-clock deadline for a single attempt */
  per_attempt_timeout_seconds: number;
}

/**
 * Per-operation overrides of the global retry settings.
 */
export type OperationOverrides = Partial<Record<OperationName, Partial<RetryConfig>>>;

/**
 * Git invocation settings.
 */
export interface GitConfig {
  /** Executable used for every git call */
  command: string;
  /** Remote used when a command does not name one */
  default_remote: string;
  /** Paths matching these globs do not count as uncommitted changes */
  ignore_dirty_globs: string[];
}

export interface LoggingConfig {
  /** Lowest level written to the log sink */
  level: LogLevel;
}

export interface AlertsConfig {
  /** Whether alert-worthy outcomes are forwarded to the alert sink */
  enabled: boolean;
}

/**
 * Root configuration object with defaults applied.
 */
export interface GitlatchConfig {
  version: string;
  lock: LockConfig;
  retry: RetryConfig;
  operations: OperationOverrides;
  git: GitConfig;
  logging: LoggingConfig;
  alerts: AlertsConfig;
}

/**
 * Shape of the configuration file as written on disk.
 */
export interface GitlatchConfigFile {
  version?: string;
  lock?: Partial<LockConfig>;
  retry?: Partial<RetryConfig>;
  operations?: OperationOverrides;
  git?: Partial<GitConfig>;
  logging?: Partial<LoggingConfig>;
  alerts?: Partial<AlertsConfig>;
}
