/**
 * Input validation for names passed to git.
 *
 * Rules are narrower than git's own ref-format rules: anything that could be
 * read as an option, a revision expression or a path escape is rejected
 * before a lock is taken or a command runs.
 */

export const MAX_NAME_LEN = 255;

export const PULL_STRATEGIES = ['merge', 'rebase', 'ff-only'] as const;
export type PullStrategy = typeof PULL_STRATEGIES[number];

export const MERGE_STRATEGIES = ['ort', 'recursive', 'resolve', 'octopus', 'ours', 'subtree'] as const;
export type MergeStrategy = typeof MERGE_STRATEGIES[number];

const PULL_STRATEGIES_SET: ReadonlySet<string> = new Set(PULL_STRATEGIES);
const MERGE_STRATEGIES_SET: ReadonlySet<string> = new Set(MERGE_STRATEGIES);

export type NameKind = 'branch' | 'tag' | 'remote' | 'ref' | 'commit';

/**
 * Why a name was rejected.
 */
export type NameRejection =
  | 'empty'
  | 'too_long'
  | 'whitespace'
  | 'metachar'
  | 'dotdot'
  | 'leading_dash'
  | 'slash'
  | 'charset'
  | 'ref_format'
  | 'semver';

export type NameValidationResult =
  | { ok: true }
  | { ok: false; kind: NameKind; value: string; reason: NameRejection; message: string };

const BRANCH_CHARSET = /^[A-Za-z0-9/._-]+$/;
const TAG_CHARSET = /^[A-Za-z0-9._+-]+$/;
const TAG_REF_CHARSET = /^[A-Za-z0-9/._+-]+$/;
const TAG_REF_PREFIX = 'refs/tags/';
const METACHARS = /[~^:*?[\\@{}]/;
const LOOKS_LIKE_VERSION = /^v?\d+\./;
const SEMVER = /^v?\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?$/;

const REASON_TEXT: Readonly<Record<NameRejection, string>> = {
  empty: 'must not be empty',
  too_long: `must be at most ${MAX_NAME_LEN} characters`,
  whitespace: 'must not contain whitespace',
  metachar: 'must not contain any of ~ ^ : * ? [ \\ @ { }',
  dotdot: "must not contain '..'",
  leading_dash: "must not start with '-'",
  slash: "must not start or end with '/' or contain '//'",
  charset: 'contains characters outside the allowed set',
  ref_format: "must not end with '.' or '.lock' or have a component starting with '.'",
  semver: 'looks like a version but is not a valid semantic version (vMAJOR.MINOR.PATCH[-pre][+build])',
};

function reject(kind: NameKind, value: string, reason: NameRejection): NameValidationResult {
  return { ok: false, kind, value, reason, message: `Invalid ${kind} name '${value}': ${REASON_TEXT[reason]}` };
}

/**
 * Checks shared by every name kind. Returns null if none applies.
 */
function checkCommon(kind: NameKind, value: string, charset: RegExp): NameValidationResult | null {
  if (value.length === 0) return reject(kind, value, 'empty');
  if (value.length > MAX_NAME_LEN) return reject(kind, value, 'too_long');
  if (/\s/.test(value)) return reject(kind, value, 'whitespace');
  if (METACHARS.test(value)) return reject(kind, value, 'metachar');
  if (value.includes('..')) return reject(kind, value, 'dotdot');
  if (value.startsWith('-')) return reject(kind, value, 'leading_dash');
  if (!charset.test(value)) return reject(kind, value, 'charset');
  if (value.startsWith('/') || value.endsWith('/') || value.includes('//')) return reject(kind, value, 'slash');
  if (value.endsWith('.') || value.endsWith('.lock') || value.split('/').some((part) => part.startsWith('.'))) {
    return reject(kind, value, 'ref_format');
  }
  return null;
}

/**
 * Validates a branch name.
 *
 * @example
 * ```typescript
 * validateBranchName('feature/login'); // { ok: true }
 * validateBranchName('../etc');        // { ok: false, reason: 'dotdot', ... }
 * ```
 */
export function validateBranchName(name: string, kind: NameKind = 'branch'): NameValidationResult {
  return checkCommon(kind, name, BRANCH_CHARSET) ?? { ok: true };
}

/**
 * Validates a tag name.
 *
 * A name that starts like a version (`1.`, `v2.`) must be a complete
 * semantic version; `1.2` and `v1.2.x` are rejected rather than accepted as
 * free-form tags.
 */
export function validateTagName(name: string): NameValidationResult {
  const common = checkCommon('tag', name, TAG_CHARSET);
  if (common) return common;
  if (LOOKS_LIKE_VERSION.test(name) && !SEMVER.test(name)) {
    return reject('tag', name, 'semver');
  }
  return { ok: true };
}

/** Remote names follow the branch rules. */
export function validateRemoteName(name: string): NameValidationResult {
  return validateBranchName(name, 'remote');
}

/**
 * Refs to push: `HEAD`, a branch, or a `refs/...` path. Refs under
 * `refs/tags/` take the tag charset so any valid tag can be pushed.
 */
export function validateRefName(name: string): NameValidationResult {
  if (name.startsWith(TAG_REF_PREFIX)) {
    return checkCommon('ref', name, TAG_REF_CHARSET) ?? { ok: true };
  }
  return validateBranchName(name, 'ref');
}

/** Commits to tag: `HEAD`, a branch or a hex object name. */
export function validateCommitish(name: string): NameValidationResult {
  return validateBranchName(name, 'commit');
}

export function isPullStrategy(value: string): value is PullStrategy {
  return PULL_STRATEGIES_SET.has(value);
}

export function isMergeStrategy(value: string): value is MergeStrategy {
  return MERGE_STRATEGIES_SET.has(value);
}
