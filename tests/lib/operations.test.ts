import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import { GitProbeError } from '@/lib/git.js';
import { LockManager } from '@/lib/lock_manager.js';
import { FileLockStore, LockStoreError } from '@/lib/lock_store.js';
import { AtomicOperations, type AtomicOperationsOptions } from '@/lib/operations.js';
import type { OperationName } from '@/types/lock.js';
import type { AttemptStatus, RetryPolicy } from '@/types/outcome.js';
import type { AlertSink } from '@/types/sinks.js';
import { createTestPolicy, FakeProbe, FakeRunner, RecordingAlertSink, RecordingLogSink } from '../helpers/mocks.js';

class FailingRemoveStore extends FileLockStore {
  async remove(operation: OperationName): Promise<void> {
    throw new LockStoreError('Failed to remove lock file', this.pathFor(operation));
  }
}

describe('AtomicOperations', () => {
  let testDir: string;
  let store: FileLockStore;
  let probe: FakeProbe;
  let logger: RecordingLogSink;
  let alerts: RecordingAlertSink;

  function create(
    runner: FakeRunner,
    policy: RetryPolicy = createTestPolicy(),
    overrides: Partial<AtomicOperationsOptions> = {}
  ): AtomicOperations {
    return new AtomicOperations({
      locks: new LockManager({ store, pollIntervalMs: 10, logger }),
      runner,
      probe,
      policy,
      logger,
      alerts,
      sleep: async () => undefined,
      ...overrides,
    });
  }

  function args(runner: FakeRunner): string[][] {
    return runner.calls.map((call) => call.args);
  }

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'gitlatch-ops-'));
    store = new FileLockStore(testDir);
    probe = new FakeProbe();
    logger = new RecordingLogSink();
    alerts = new RecordingAlertSink();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('push', () => {
    it('should push HEAD to the default remote and release the lock', async () => {
      const runner = new FakeRunner();

      const outcome = await create(runner).push();

      expect(outcome).toEqual({
        code: 'SUCCEEDED',
        operation: 'push',
        message: 'git push succeeded',
        attempts: 1,
        last_status: { kind: 'success' },
        conflicts: [],
        warnings: [],
        chained: null,
      });
      expect(runner.calls).toEqual([{ cmd: 'git', args: ['push', 'origin', 'HEAD'], cwd: undefined }]);
      expect(await store.list()).toEqual([]);
      expect(alerts.alerts).toEqual([]);
    });

    it('should hold the push lock while the command runs', async () => {
      const held: boolean[] = [];
      const runner = new FakeRunner(async () => {
        held.push((await store.read('push'))?.owner_pid === process.pid);
        return { kind: 'success' };
      });

      await create(runner).push();

      expect(held).toEqual([true]);
    });

    it('should pass remote, ref and --force-with-lease', async () => {
      const runner = new FakeRunner();

      await create(runner, createTestPolicy(), { defaultRemote: 'upstream' }).push({ ref: 'main', forceWithLease: true });

      expect(args(runner)).toEqual([['push', '--force-with-lease', 'upstream', 'main']]);
    });

    it('should report RETRIES_EXHAUSTED after maxAttempts failures and alert', async () => {
      const runner = new FakeRunner({ kind: 'failure', exit_code: 1 });

      const outcome = await create(runner, createTestPolicy({ maxAttempts: 3 })).push();

      expect(outcome.code).toBe('RETRIES_EXHAUSTED');
      expect(outcome.attempts).toBe(3);
      expect(outcome.message).toBe('git push failed after 3 attempt(s): last attempt exited with code 1');
      expect(runner.calls).toHaveLength(3);
      expect(alerts.alerts).toEqual([
        { severity: 'medium', title: 'git push: RETRIES_EXHAUSTED', message: outcome.message },
      ]);
      expect(await store.list()).toEqual([]);
    });

    it('should report a timed-out final attempt', async () => {
      const runner = new FakeRunner({ kind: 'timeout' });

      const outcome = await create(runner, createTestPolicy({ maxAttempts: 1 })).push();

      expect(outcome.message).toBe('git push failed after 1 attempt(s): last attempt timed out');
      expect(outcome.last_status).toEqual({ kind: 'timeout' });
    });

    it('should reject an invalid ref without taking the lock', async () => {
      const runner = new FakeRunner();

      const outcome = await create(runner).push({ ref: 'HEAD~1' });

      expect(outcome.code).toBe('VALIDATION_FAILED');
      expect(outcome.message).toBe("Invalid ref name 'HEAD~1': must not contain any of ~ ^ : * ? [ \\ @ { }");
      expect(runner.calls).toEqual([]);
      expect(await store.list()).toEqual([]);
    });
  });

  describe('pull', () => {
    it('should pull the current branch with --no-ff by default', async () => {
      const runner = new FakeRunner();

      const outcome = await create(runner).pull();

      expect(outcome.code).toBe('SUCCEEDED');
      expect(args(runner)).toEqual([['pull', '--no-ff', 'origin', 'main']]);
    });

    it.each([
      ['rebase', '--rebase'],
      ['ff-only', '--ff-only'],
    ])('should map the %s strategy to %s', async (strategy, flag) => {
      const runner = new FakeRunner();

      await create(runner).pull({ branch: 'develop', strategy });

      expect(args(runner)).toEqual([['pull', flag, 'origin', 'develop']]);
    });

    it('should reject an unknown strategy', async () => {
      const outcome = await create(new FakeRunner()).pull({ strategy: 'octopus' });

      expect(outcome.code).toBe('VALIDATION_FAILED');
      expect(outcome.message).toBe('Invalid pull strategy: octopus (expected one of merge, rebase, ff-only)');
    });

    it('should reject a detached HEAD when no branch is given', async () => {
      probe.branch = null;
      const runner = new FakeRunner();

      const outcome = await create(runner).pull();

      expect(outcome.code).toBe('VALIDATION_FAILED');
      expect(outcome.message).toBe('No branch given and HEAD is detached');
      expect(runner.calls).toEqual([]);
    });

    it('should reject when not in a repository', async () => {
      probe.repository = false;

      const outcome = await create(new FakeRunner()).pull();

      expect(outcome.message).toBe('Not in a git repository');
    });

    it('should reject a missing git identity', async () => {
      probe.gitIdentity = { name: 'Test User', email: null };
      const runner = new FakeRunner();

      const outcome = await create(runner).pull();

      expect(outcome.code).toBe('VALIDATION_FAILED');
      expect(outcome.message).toBe('Git user configuration missing (name/email)');
      expect(runner.calls).toEqual([]);
    });

    it('should warn about uncommitted changes but still pull', async () => {
      probe.dirty = ['src/a.ts', 'src/b.ts'];
      probe.untracked = 4;
      const runner = new FakeRunner();

      const outcome = await create(runner, createTestPolicy(), { ignoreDirtyGlobs: ['dist/**'] }).pull();

      expect(outcome.code).toBe('SUCCEEDED');
      expect(outcome.warnings).toEqual(['Working directory has uncommitted changes (2 file(s))']);
      expect(probe.dirtyGlobs).toEqual([['dist/**']]);
      expect(logger.messages('WARN')).toContain('Working directory has uncommitted changes (2 file(s))');
      expect(logger.messages('DEBUG')).toContain('Found 4 untracked files');
    });
  });

  describe('checkout', () => {
    it.each(['../etc', '-x'])('should reject %s before any lock or command', async (branch) => {
      // A live holder would make any lock attempt wait
      await writeFile(store.pathFor('checkout'), `${process.pid}\n`);
      const runner = new FakeRunner();

      const outcome = await create(runner, createTestPolicy({ lockAcquireTimeoutMs: 60_000 })).checkout({ branch });

      expect(outcome.code).toBe('VALIDATION_FAILED');
      expect(outcome.attempts).toBe(0);
      expect(runner.calls).toEqual([]);
      expect(await readFile(store.pathFor('checkout'), 'utf-8')).toBe(`${process.pid}\n`);
    });

    it('should check out an existing branch', async () => {
      const runner = new FakeRunner();

      await create(runner).checkout({ branch: 'main' });

      expect(args(runner)).toEqual([['checkout', 'main']]);
    });

    it('should create a branch from a base', async () => {
      const runner = new FakeRunner();

      await create(runner).checkout({ branch: 'feature/x', create: true, base: 'main' });

      expect(args(runner)).toEqual([['checkout', '-b', 'feature/x', 'main']]);
    });
  });

  describe('tag', () => {
    it('should reject an incomplete version before any command', async () => {
      const runner = new FakeRunner();

      const outcome = await create(runner).tag({ name: '1.2' });

      expect(outcome.code).toBe('VALIDATION_FAILED');
      expect(runner.calls).toEqual([]);
      expect(await store.list()).toEqual([]);
    });

    it('should create the tag and push it as a separate operation', async () => {
      const runner = new FakeRunner();

      const outcome = await create(runner).tag({ name: 'v1.0.0' });

      expect(args(runner)).toEqual([
        ['tag', 'v1.0.0', 'HEAD'],
        ['push', 'origin', 'refs/tags/v1.0.0'],
      ]);
      expect(outcome.code).toBe('SUCCEEDED');
      expect(outcome.operation).toBe('tag');
      expect(outcome.message).toBe('git tag succeeded; pushed refs/tags/v1.0.0');
      expect(outcome.chained?.operation).toBe('push');
      expect(outcome.chained?.code).toBe('SUCCEEDED');
      expect(await store.list()).toEqual([]);
    });

    it('should push a semver tag with build metadata', async () => {
      const runner = new FakeRunner();

      const outcome = await create(runner).tag({ name: 'v1.2.3+build.7' });

      expect(outcome.code).toBe('SUCCEEDED');
      expect(args(runner)).toEqual([
        ['tag', 'v1.2.3+build.7', 'HEAD'],
        ['push', 'origin', 'refs/tags/v1.2.3+build.7'],
      ]);
    });

    it('should validate the chained push remote before creating the tag', async () => {
      const runner = new FakeRunner();

      const outcome = await create(runner, createTestPolicy(), { defaultRemote: '-bad' }).tag({ name: 'v1.0.0' });

      expect(outcome.code).toBe('VALIDATION_FAILED');
      expect(outcome.message).toBe("Invalid remote name '-bad': must not start with '-'");
      expect(runner.calls).toEqual([]);
      expect(await store.list()).toEqual([]);
    });

    it('should not validate the default remote when the tag is not pushed', async () => {
      const runner = new FakeRunner();

      const outcome = await create(runner, createTestPolicy(), { defaultRemote: '-bad' }).tag({ name: 'v1.0.0', push: false });

      expect(outcome.code).toBe('SUCCEEDED');
      expect(args(runner)).toEqual([['tag', 'v1.0.0', 'HEAD']]);
    });

    it('should create an annotated tag without pushing', async () => {
      const runner = new FakeRunner();

      const outcome = await create(runner).tag({ name: 'v1.0.0', commit: 'abc1234', message: 'Release 1.0', push: false });

      expect(args(runner)).toEqual([['tag', '-a', '-m', 'Release 1.0', 'v1.0.0', 'abc1234']]);
      expect(outcome.chained).toBeNull();
    });

    it('should surface a failed tag push', async () => {
      const runner = new FakeRunner({ kind: 'success' }, { kind: 'failure', exit_code: 1 });

      const outcome = await create(runner, createTestPolicy({ maxAttempts: 1 })).tag({ name: 'v2.0.0' });

      expect(outcome.code).toBe('RETRIES_EXHAUSTED');
      expect(outcome.message).toBe(
        'Tag created but push failed: git push failed after 1 attempt(s): last attempt exited with code 1'
      );
      expect(outcome.chained?.code).toBe('RETRIES_EXHAUSTED');
    });

    it('should not push when tag creation fails', async () => {
      const runner = new FakeRunner({ kind: 'failure', exit_code: 128 });

      const outcome = await create(runner, createTestPolicy({ maxAttempts: 2 })).tag({ name: 'v1.0.0' });

      expect(outcome.code).toBe('RETRIES_EXHAUSTED');
      expect(args(runner)).toEqual([
        ['tag', 'v1.0.0', 'HEAD'],
        ['tag', 'v1.0.0', 'HEAD'],
      ]);
    });
  });

  describe('merge', () => {
    it('should merge with --no-ff and the ort strategy by default', async () => {
      const runner = new FakeRunner();

      const outcome = await create(runner).merge({ branch: 'feature/x' });

      expect(outcome.code).toBe('SUCCEEDED');
      expect(args(runner)).toEqual([['merge', '--no-ff', '--strategy=ort', 'feature/x']]);
    });

    it('should allow fast-forward merges', async () => {
      const runner = new FakeRunner();

      await create(runner).merge({ branch: 'feature/x', noFf: false, strategy: 'recursive' });

      expect(args(runner)).toEqual([['merge', '--strategy=recursive', 'feature/x']]);
    });

    it('should raise a failed conflict scan and still release the lock', async () => {
      const runner = new FakeRunner();
      probe.unmergedError = new GitProbeError('Failed to list unmerged paths: git exited with 128', ['ls-files', '--unmerged']);

      await expect(create(runner).merge({ branch: 'feature/x' })).rejects.toThrow(GitProbeError);

      expect(runner.calls).toHaveLength(1);
      expect(await store.list()).toEqual([]);
    });

    it('should report conflicts without retrying and alert', async () => {
      const runner = new FakeRunner(() => {
        probe.unmerged = ['src/a.ts', 'src/b.ts'];
        return { kind: 'failure', exit_code: 1 };
      });

      const outcome = await create(runner, createTestPolicy({ maxAttempts: 3 })).merge({ branch: 'feature/x' });

      expect(outcome.code).toBe('CONFLICT_DETECTED');
      expect(outcome.attempts).toBe(1);
      expect(outcome.conflicts).toEqual(['src/a.ts', 'src/b.ts']);
      expect(outcome.message).toBe('Merge conflicts detected in 2 file(s)');
      expect(runner.calls).toHaveLength(1);
      expect(alerts.alerts).toEqual([
        { severity: 'high', title: 'git merge: CONFLICT_DETECTED', message: 'Merge conflicts detected in 2 file(s)' },
      ]);
      expect(logger.messages('ERROR')).toContain('  - src/a.ts');
      expect(await store.list()).toEqual([]);
    });

    it('should retry a failure that left no conflicts', async () => {
      const runner = new FakeRunner({ kind: 'failure', exit_code: 1 });

      const outcome = await create(runner, createTestPolicy({ maxAttempts: 3 })).merge({ branch: 'feature/x' });

      expect(outcome.code).toBe('RETRIES_EXHAUSTED');
      expect(runner.calls).toHaveLength(3);
    });

    it('should reject an unknown strategy', async () => {
      const outcome = await create(new FakeRunner()).merge({ branch: 'feature/x', strategy: 'theirs' });

      expect(outcome.message).toBe(
        'Invalid merge strategy: theirs (expected one of ort, recursive, resolve, octopus, ours, subtree)'
      );
    });

    it('should time out on a lock held by a live process and leave it untouched', async () => {
      await writeFile(store.pathFor('merge'), `${process.pid}\n`);
      const runner = new FakeRunner();

      const outcome = await create(runner, createTestPolicy({ lockAcquireTimeoutMs: 50 })).merge({ branch: 'feature/x' });

      expect(outcome.code).toBe('LOCK_TIMED_OUT');
      expect(outcome.message).toMatch(new RegExp(`^Timed out after \\d+ms waiting for the merge lock \\(held by PID ${process.pid}\\)$`));
      expect(runner.calls).toEqual([]);
      expect(await readFile(store.pathFor('merge'), 'utf-8')).toBe(`${process.pid}\n`);
      expect(alerts.alerts.map((alert) => alert.severity)).toEqual(['medium']);
    });
  });

  describe('locking', () => {
    it('should serialize the same operation across lock managers', async () => {
      let active = 0;
      let maxActive = 0;
      const runner = new FakeRunner(async (): Promise<AttemptStatus> => {
        active++;
        maxActive = Math.max(maxActive, active);
        await delay(30);
        active--;
        return { kind: 'success' };
      });
      const policy = createTestPolicy({ lockAcquireTimeoutMs: 5000 });

      const outcomes = await Promise.all([create(runner, policy).push(), create(runner, policy).push()]);

      expect(outcomes.map((outcome) => outcome.code)).toEqual(['SUCCEEDED', 'SUCCEEDED']);
      expect(maxActive).toBe(1);
      expect(runner.calls).toHaveLength(2);
    });

    it('should run different operations in parallel', async () => {
      let active = 0;
      let maxActive = 0;
      const runner = new FakeRunner(async (): Promise<AttemptStatus> => {
        active++;
        maxActive = Math.max(maxActive, active);
        await delay(50);
        active--;
        return { kind: 'success' };
      });
      const ops = create(runner);

      await Promise.all([ops.push(), ops.checkout({ branch: 'main' })]);

      expect(maxActive).toBe(2);
    });

    it('should use per-operation policies', async () => {
      const runner = new FakeRunner({ kind: 'failure', exit_code: 1 });
      const ops = create(runner, createTestPolicy({ maxAttempts: 3 }), {
        policies: { checkout: createTestPolicy({ maxAttempts: 1 }) },
      });

      await ops.checkout({ branch: 'main' });

      expect(runner.calls).toHaveLength(1);
      expect(ops.policyFor('push').maxAttempts).toBe(3);
    });

    it('should release the lock when the run is interrupted', async () => {
      const controller = new AbortController();
      const runner = new FakeRunner(() => {
        controller.abort();
        return { kind: 'interrupted' };
      });

      const outcome = await create(runner).push({ signal: controller.signal });

      expect(outcome.code).toBe('INTERRUPTED');
      expect(outcome.message).toBe('git push was interrupted');
      expect(await store.list()).toEqual([]);
    });

    it('should stop waiting for the lock when interrupted', async () => {
      await writeFile(store.pathFor('pull'), `${process.pid}\n`);
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 30);
      const runner = new FakeRunner();

      const outcome = await create(runner, createTestPolicy({ lockAcquireTimeoutMs: 5000 })).pull({
        signal: controller.signal,
      });

      expect(outcome.code).toBe('INTERRUPTED');
      expect(outcome.message).toBe('Interrupted while waiting for the pull lock');
      expect(runner.calls).toEqual([]);
    });

    it('should raise a release failure instead of masking it', async () => {
      store = new FailingRemoveStore(testDir);

      await expect(create(new FakeRunner()).push()).rejects.toThrow(LockStoreError);
    });
  });

  describe('alerts', () => {
    it('should log and continue when alert delivery fails', async () => {
      const failing: AlertSink = {
        notify: async () => {
          throw new Error('pager unavailable');
        },
      };
      const runner = new FakeRunner({ kind: 'failure', exit_code: 1 });

      const outcome = await create(runner, createTestPolicy({ maxAttempts: 1 }), { alerts: failing }).push();

      expect(outcome.code).toBe('RETRIES_EXHAUSTED');
      expect(logger.messages('ERROR')).toContain('Alert delivery failed');
    });

    it('should not alert when no alert sink is configured', async () => {
      const runner = new FakeRunner({ kind: 'failure', exit_code: 1 });

      await create(runner, createTestPolicy({ maxAttempts: 1 }), { alerts: undefined }).push();

      expect(alerts.alerts).toEqual([]);
    });
  });
});
