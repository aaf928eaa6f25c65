/**
 * Environment checks behind `gitlatch doctor`.
 */

import { constants } from 'node:fs';
import { access, mkdir } from 'node:fs/promises';
import type { GitlatchConfig } from '../types/config.js';
import { ConfigError, findConfigFile, loadConfig } from './config.js';
import { ProcessCommandRunner, type CommandRunner } from './executor.js';
import { GitCliProbe, type RepositoryProbe } from './git.js';

export type DoctorStatus = 'OK' | 'WARN' | 'FAIL';

export interface DoctorCheck {
  status: DoctorStatus;
  message: string;
}

export interface DoctorReport {
  checks: DoctorCheck[];
  /** FAIL and WARN messages, in check order */
  issues: string[];
  config: GitlatchConfig | null;
}

export interface DoctorOptions {
  configPath?: string;
  env?: Record<string, string | undefined>;
  cwd?: string;
  runner?: CommandRunner;
  /** Built from the loaded config when omitted */
  probe?: RepositoryProbe;
}

const GIT_VERSION_TIMEOUT_MS = 10000;

export async function runDoctor(options: DoctorOptions = {}): Promise<DoctorReport> {
  const checks: DoctorCheck[] = [];
  const add = (status: DoctorStatus, message: string): void => {
    checks.push({ status, message });
  };

  const configPath = options.configPath ?? (await findConfigFile(options.cwd));
  let config: GitlatchConfig | null = null;
  try {
    config = await loadConfig(configPath ?? undefined, options.env);
    add('OK', configPath ? `Config file is valid: ${configPath}` : 'No config file found, using defaults');
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    add('FAIL', `Configuration error: ${error.message}`);
  }

  const gitCommand = config?.git.command ?? 'git';
  const runner = options.runner ?? new ProcessCommandRunner();
  const version = await runner.run({ cmd: gitCommand, args: ['--version'] }, GIT_VERSION_TIMEOUT_MS);
  if (version.status.kind !== 'success') {
    add('FAIL', `Git (${gitCommand}) is not available`);
  } else {
    add('OK', `Git is available: ${version.output.trim()}`);

    const probe = options.probe ?? new GitCliProbe(options.cwd, gitCommand);
    if (!probe.isRepository()) {
      add('WARN', 'Current directory is not a git repository');
    } else {
      add('OK', 'Current directory is a git repository');
      const identity = probe.identity();
      if (identity.name && identity.email) {
        add('OK', `Git identity: ${identity.name} <${identity.email}>`);
      } else {
        add('FAIL', 'Git user configuration missing (name/email)');
      }
    }
  }

  if (config) {
    const directory = config.lock.directory;
    try {
      await mkdir(directory, { recursive: true });
      await access(directory, constants.W_OK);
      add('OK', `Lock directory is writable: ${directory}`);
    } catch (error) {
      add('FAIL', `Lock directory is not writable: ${directory} (${error instanceof Error ? error.message : String(error)})`);
    }
  }

  return {
    checks,
    issues: checks.filter((check) => check.status !== 'OK').map((check) => check.message),
    config,
  };
}
