/**
 * Configuration loading and validation.
 *
 * Sources, lowest precedence first: built-in defaults, gitlatch.config.json
 * (found by walking up from the cwd, or given explicitly), then GITLATCH_*
 * environment variables.
 */

import { access } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import type { GitlatchConfig, GitlatchConfigFile, RetryConfig } from '../types/config.js';
import type { OperationName } from '../types/lock.js';
import type { RetryPolicy } from '../types/outcome.js';
import { atomicReadJson, AtomicFsError } from './fs.js';
import { isLogLevel } from './log.js';
import { loadSchema, validateWithSchema } from './schema.js';
import { secondsToMs } from './time.js';

/** Default configuration file name */
export const CONFIG_FILE_NAME = 'gitlatch.config.json';

const CONFIG_SCHEMA_URL = new URL('../../schemas/config.schema.json', import.meta.url);

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

/**
 * Searches for a configuration file by walking upward from `startDir`.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Not here; keep walking up.
    }

    if (currentDir === dirname(currentDir)) {
      return null;
    }
    currentDir = dirname(currentDir);
  }
}

/**
 * `$XDG_RUNTIME_DIR/git-locks`, falling back to the OS temp directory.
 */
export function defaultLockDirectory(env: Env = process.env): string {
  return join(env.XDG_RUNTIME_DIR || tmpdir(), 'git-locks');
}

export function defaultConfig(env: Env = process.env): GitlatchConfig {
  return {
    version: '1',
    lock: {
      directory: defaultLockDirectory(env),
      acquire_timeout_seconds: 300,
      poll_interval_ms: 1000,
    },
    retry: {
      max_attempts: 3,
      inter_attempt_delay_seconds: 2,
      per_attempt_timeout_seconds: 60,
    },
    operations: {},
    git: {
      command: 'git',
      default_remote: 'origin',
      ignore_dirty_globs: [],
    },
    logging: { level: 'INFO' },
    alerts: { enabled: true },
  };
}

/**
 * Overlays a parsed config file on `base`. A relative lock directory is
 * resolved against `baseDir` (the config file's directory).
 */
export function mergeConfig(base: GitlatchConfig, file: GitlatchConfigFile, baseDir: string): GitlatchConfig {
  const lockDirectory = file.lock?.directory;
  return {
    version: file.version ?? base.version,
    lock: {
      ...base.lock,
      ...file.lock,
      directory: lockDirectory !== undefined ? resolve(baseDir, lockDirectory) : base.lock.directory,
    },
    retry: { ...base.retry, ...file.retry },
    operations: { ...base.operations, ...file.operations },
    git: { ...base.git, ...file.git },
    logging: { ...base.logging, ...file.logging },
    alerts: { ...base.alerts, ...file.alerts },
  };
}

function parseNumber(name: string, raw: string, options: { integer?: boolean; min: number; exclusive?: boolean }): number {
  const value = Number(raw.trim());
  const belowMin = options.exclusive ? value <= options.min : value < options.min;
  if (raw.trim() === '' || !Number.isFinite(value) || belowMin || (options.integer && !Number.isInteger(value))) {
    const bound = `${options.exclusive ? '>' : '>='} ${options.min}`;
    throw new ConfigError(`${name} must be ${options.integer ? 'an integer' : 'a number'} ${bound}, got '${raw}'`);
  }
  return value;
}

/**
 * Applies GITLATCH_* environment overrides.
 *
 * @throws {ConfigError} If a variable holds an invalid value
 */
export function applyEnvOverrides(config: GitlatchConfig, env: Env = process.env): GitlatchConfig {
  const result: GitlatchConfig = {
    ...config,
    lock: { ...config.lock },
    retry: { ...config.retry },
    logging: { ...config.logging },
  };

  if (env.GITLATCH_LOCK_DIR) {
    result.lock.directory = resolve(env.GITLATCH_LOCK_DIR);
  }
  if (env.GITLATCH_LOCK_TIMEOUT !== undefined) {
    result.lock.acquire_timeout_seconds = parseNumber('GITLATCH_LOCK_TIMEOUT', env.GITLATCH_LOCK_TIMEOUT, { min: 0 });
  }
  if (env.GITLATCH_OPERATION_TIMEOUT !== undefined) {
    result.retry.per_attempt_timeout_seconds = parseNumber('GITLATCH_OPERATION_TIMEOUT', env.GITLATCH_OPERATION_TIMEOUT, {
      min: 0,
      exclusive: true,
    });
  }
  if (env.GITLATCH_RETRY_ATTEMPTS !== undefined) {
    result.retry.max_attempts = parseNumber('GITLATCH_RETRY_ATTEMPTS', env.GITLATCH_RETRY_ATTEMPTS, { integer: true, min: 1 });
  }
  if (env.GITLATCH_RETRY_DELAY !== undefined) {
    result.retry.inter_attempt_delay_seconds = parseNumber('GITLATCH_RETRY_DELAY', env.GITLATCH_RETRY_DELAY, { min: 0 });
  }
  if (env.GITLATCH_LOG_LEVEL !== undefined) {
    const level = env.GITLATCH_LOG_LEVEL.trim().toUpperCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`GITLATCH_LOG_LEVEL must be one of DEBUG, INFO, WARN, ERROR, got '${env.GITLATCH_LOG_LEVEL}'`);
    }
    result.logging.level = level;
  }

  return result;
}

/**
 * Validates a parsed config file against schemas/config.schema.json.
 *
 * @throws {ConfigError} If the structure is invalid
 */
export async function validateConfigFile(raw: unknown, configPath?: string): Promise<GitlatchConfigFile> {
  const schema = await loadSchema(CONFIG_SCHEMA_URL);
  const result = validateWithSchema<GitlatchConfigFile>(raw, schema);
  if (!result.valid) {
    throw new ConfigError(`Invalid configuration file: ${result.errors.join('; ')}`, configPath);
  }
  return result.data;
}

/**
 * Loads the effective configuration.
 *
 * @param configPath - Explicit config file (no search). When omitted, searches
 *                     upward from the cwd and falls back to defaults.
 * @throws {ConfigError} If the config file cannot be read or is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const policy = resolveRetryPolicy(config, 'push');
 * ```
 */
export async function loadConfig(configPath?: string, env: Env = process.env): Promise<GitlatchConfig> {
  const resolvedPath = configPath !== undefined ? resolve(configPath) : await findConfigFile();
  let config = defaultConfig(env);

  if (resolvedPath !== null) {
    let raw: unknown;
    try {
      raw = await atomicReadJson(resolvedPath);
    } catch (error) {
      if (error instanceof AtomicFsError) {
        throw new ConfigError(`Failed to read configuration file: ${error.message}`, resolvedPath, error);
      }
      throw error;
    }
    const file = await validateConfigFile(raw, resolvedPath);
    config = mergeConfig(config, file, dirname(resolvedPath));
  }

  return applyEnvOverrides(config, env);
}

/**
 * Builds the immutable retry policy for one operation, or from `retry` alone
 * when no operation is given.
 */
export function resolveRetryPolicy(config: GitlatchConfig, operation?: OperationName): RetryPolicy {
  const retry: RetryConfig = { ...config.retry, ...(operation !== undefined ? config.operations[operation] : {}) };
  return {
    maxAttempts: retry.max_attempts,
    interAttemptDelayMs: secondsToMs(retry.inter_attempt_delay_seconds),
    perAttemptTimeoutMs: secondsToMs(retry.per_attempt_timeout_seconds),
    lockAcquireTimeoutMs: secondsToMs(config.lock.acquire_timeout_seconds),
  };
}

export function resolveRetryPolicies(config: GitlatchConfig): Record<OperationName, RetryPolicy> {
  return {
    push: resolveRetryPolicy(config, 'push'),
    pull: resolveRetryPolicy(config, 'pull'),
    checkout: resolveRetryPolicy(config, 'checkout'),
    tag: resolveRetryPolicy(config, 'tag'),
    merge: resolveRetryPolicy(config, 'merge'),
  };
}
