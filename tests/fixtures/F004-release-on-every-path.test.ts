/**
 * Fixture test: the lock is released on every exit path.
 *
 * Success, execution failure, merge conflict and interrupt all pass through
 * release; validation failure never takes the lock at all.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { LockManager } from '@/lib/lock_manager.js';
import { FileLockStore } from '@/lib/lock_store.js';
import { AtomicOperations } from '@/lib/operations.js';
import type { OutcomeCode } from '@/constants/outcome_codes.js';
import type { OperationOutcome } from '@/types/outcome.js';
import { createTestPolicy, FakeProbe, FakeRunner } from '../helpers/mocks.js';

interface PathCase {
  name: string;
  expected: OutcomeCode;
  run: (operations: AtomicOperations, probe: FakeProbe) => Promise<OperationOutcome>;
  runner: () => FakeRunner;
}

const controller = new AbortController();

const CASES: PathCase[] = [
  {
    name: 'success',
    expected: 'SUCCEEDED',
    runner: () => new FakeRunner(),
    run: (operations) => operations.checkout({ branch: 'main' }),
  },
  {
    name: 'validation failure',
    expected: 'VALIDATION_FAILED',
    runner: () => new FakeRunner(),
    run: (operations) => operations.checkout({ branch: '../etc' }),
  },
  {
    name: 'execution failure',
    expected: 'RETRIES_EXHAUSTED',
    runner: () => new FakeRunner({ kind: 'failure', exit_code: 1 }),
    run: (operations) => operations.push(),
  },
  {
    name: 'merge conflict',
    expected: 'CONFLICT_DETECTED',
    runner: () => new FakeRunner({ kind: 'failure', exit_code: 1 }),
    run: (operations, probe) => {
      probe.unmerged = ['src/conflict.ts'];
      return operations.merge({ branch: 'feature/x' });
    },
  },
  {
    name: 'interrupt',
    expected: 'INTERRUPTED',
    runner: () =>
      new FakeRunner(() => {
        controller.abort();
        return { kind: 'interrupted' };
      }),
    run: (operations) => operations.pull({ signal: controller.signal }),
  },
];

describe('F004: release on every path', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'gitlatch-F004-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it.each(CASES)('should leave no lock entry after $name', async ({ expected, run, runner }) => {
    const store = new FileLockStore(testDir);
    const locks = new LockManager({ store, pollIntervalMs: 10 });
    const probe = new FakeProbe();
    const operations = new AtomicOperations({
      locks,
      runner: runner(),
      probe,
      policy: createTestPolicy(),
      sleep: async () => undefined,
    });

    const outcome = await run(operations, probe);

    expect(outcome.code).toBe(expected);
    expect(await store.list()).toEqual([]);
    expect(locks.heldLocks()).toEqual([]);
  });
});
