/**
 * Read-only git queries used for validation and conflict detection.
 *
 * Mutating commands never go through here; they run under a lock via the
 * CommandRunner. These helpers are synchronous and shell-less.
 */

import { execFileSync } from 'node:child_process';
import micromatch from 'micromatch';

/**
 * Error thrown when a git query whose answer cannot be guessed fails.
 */
export class GitProbeError extends Error {
  constructor(
    message: string,
    public readonly args: string[],
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'GitProbeError';
  }
}

export interface GitIdentity {
  name: string | null;
  email: string | null;
}

export interface DirtyState {
  clean: boolean;
  dirtyFiles: string[];
  excludedFiles: string[];
}

/**
 * Repository summary printed by `gitlatch status`.
 */
export interface RepositoryStatus {
  branch: string;
  commit: string;
  short_commit: string;
  dirty: boolean;
  untracked: number;
  ahead: number;
  behind: number;
  remote: string;
}

/**
 * Queries the façade needs about the working tree.
 */
export interface RepositoryProbe {
  isRepository(): boolean;
  /** Uncommitted changes to tracked files, minus paths matching `excludeGlobs` */
  dirtyState(excludeGlobs: string[]): DirtyState;
  untrackedCount(): number;
  identity(): GitIdentity;
  /** Paths with unmerged index entries (conflicts); throws if they cannot be listed */
  unmergedPaths(): string[];
  currentBranch(): string | null;
  status(): RepositoryStatus;
}

/**
 * Parses git status porcelain output and filters files based on exclusion globs.
 *
 * @param statusOutput - Raw output from `git status --porcelain`
 * @param excludeGlobs - Glob patterns for files to exclude from the dirty check
 */
export function parseGitStatusWithExclusions(statusOutput: string, excludeGlobs: string[]): DirtyState {
  // Only trim trailing whitespace to preserve leading space in status format
  const trimmed = statusOutput.trimEnd();
  if (trimmed === '') {
    return { clean: true, dirtyFiles: [], excludedFiles: [] };
  }

  // XY PATH, or XY ORIG -> PATH for renames and copies
  const allFiles = trimmed
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => {
      const rawPath = line.slice(3);
      const arrow = rawPath.indexOf(' -> ');
      return arrow === -1 ? rawPath : rawPath.slice(arrow + 4);
    });

  const excludedFiles: string[] = [];
  const dirtyFiles: string[] = [];

  for (const file of allFiles) {
    if (excludeGlobs.length > 0 && micromatch.isMatch(file, excludeGlobs)) {
      excludedFiles.push(file);
    } else {
      dirtyFiles.push(file);
    }
  }

  return { clean: dirtyFiles.length === 0, dirtyFiles, excludedFiles };
}

/**
 * Extracts unique paths from `git ls-files --unmerged` output.
 *
 * Each line is `<mode> <object> <stage>\t<path>`; a conflicted path appears
 * once per stage.
 */
export function parseUnmergedPaths(output: string): string[] {
  const paths = new Set<string>();
  for (const line of output.split('\n')) {
    const tab = line.indexOf('\t');
    if (tab !== -1 && tab < line.length - 1) {
      paths.add(line.slice(tab + 1));
    }
  }
  return [...paths].sort();
}

/**
 * RepositoryProbe backed by the git CLI.
 */
export class GitCliProbe implements RepositoryProbe {
  constructor(
    private readonly cwd: string = process.cwd(),
    private readonly gitCommand: string = 'git'
  ) {}

  private git(args: string[]): string {
    return execFileSync(this.gitCommand, args, {
      cwd: this.cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  }

  /** Runs git, returning null on non-zero exit. */
  private tryGit(args: string[]): string | null {
    try {
      return this.git(args);
    } catch {
      return null;
    }
  }

  isRepository(): boolean {
    return this.tryGit(['rev-parse', '--is-inside-work-tree'])?.trim() === 'true';
  }

  dirtyState(excludeGlobs: string[]): DirtyState {
    const status = this.tryGit(['status', '--porcelain', '--untracked-files=no']);
    if (status === null) {
      return { clean: false, dirtyFiles: ['<git status failed>'], excludedFiles: [] };
    }
    return parseGitStatusWithExclusions(status, excludeGlobs);
  }

  untrackedCount(): number {
    const output = this.tryGit(['ls-files', '--others', '--exclude-standard']) ?? '';
    return output.split('\n').filter((line) => line.length > 0).length;
  }

  identity(): GitIdentity {
    // `git config` exits 1 when the key is unset
    const name = this.tryGit(['config', 'user.name'])?.trim() || null;
    const email = this.tryGit(['config', 'user.email'])?.trim() || null;
    return { name, email };
  }

  unmergedPaths(): string[] {
    const args = ['ls-files', '--unmerged'];
    try {
      return parseUnmergedPaths(this.git(args));
    } catch (error) {
      throw new GitProbeError(
        `Failed to list unmerged paths: ${error instanceof Error ? error.message : String(error)}`,
        args,
        error instanceof Error ? error : undefined
      );
    }
  }

  currentBranch(): string | null {
    const branch = this.tryGit(['branch', '--show-current'])?.trim();
    return branch ? branch : null;
  }

  status(): RepositoryStatus {
    const branch = this.currentBranch();
    const count = (args: string[]): number => {
      const value = Number.parseInt(this.tryGit(args)?.trim() ?? '', 10);
      return Number.isNaN(value) ? 0 : value;
    };
    const remote = branch ? this.tryGit(['config', '--get', `branch.${branch}.remote`])?.trim() : undefined;

    return {
      branch: branch ?? 'detached',
      commit: this.tryGit(['rev-parse', 'HEAD'])?.trim() || 'unknown',
      short_commit: this.tryGit(['rev-parse', '--short', 'HEAD'])?.trim() || 'unknown',
      dirty: !this.dirtyState([]).clean,
      untracked: this.untrackedCount(),
      ahead: count(['rev-list', '--count', '@{u}..HEAD']),
      behind: count(['rev-list', '--count', 'HEAD..@{u}']),
      remote: remote || 'origin',
    };
  }
}
