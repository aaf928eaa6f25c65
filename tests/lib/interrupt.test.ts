import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { existsSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { INTERRUPT_EXIT_CODE, installInterruptHandlers } from '@/lib/interrupt.js';
import { LockManager } from '@/lib/lock_manager.js';
import { FileLockStore } from '@/lib/lock_store.js';
import { RecordingLogSink } from '../helpers/mocks.js';

describe('installInterruptHandlers', () => {
  let testDir: string;
  let store: FileLockStore;
  let locks: LockManager;
  let target: EventEmitter;
  let logger: RecordingLogSink;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'gitlatch-interrupt-'));
    store = new FileLockStore(testDir);
    locks = new LockManager({ store });
    target = new EventEmitter();
    logger = new RecordingLogSink();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should abort on the first signal and keep locks for the operation to release', async () => {
    await locks.acquire('push', 100);
    const controller = new AbortController();
    const exit = vi.fn();
    installInterruptHandlers(locks, controller, { target, exit, logger });

    target.emit('SIGINT');

    expect(controller.signal.aborted).toBe(true);
    expect(exit).not.toHaveBeenCalled();
    expect(existsSync(store.pathFor('push'))).toBe(true);
    expect(logger.messages('WARN')).toEqual(['SIGINT received, aborting current operation...']);
  });

  it('should release every lock and exit 130 on the second signal', async () => {
    await locks.acquire('push', 100);
    await locks.acquire('merge', 100);
    const exit = vi.fn();
    installInterruptHandlers(locks, new AbortController(), { target, exit, logger });

    target.emit('SIGTERM');
    target.emit('SIGINT');

    expect(exit).toHaveBeenCalledWith(INTERRUPT_EXIT_CODE);
    expect(existsSync(store.pathFor('push'))).toBe(false);
    expect(existsSync(store.pathFor('merge'))).toBe(false);
  });

  it('should release held locks on process exit', async () => {
    await locks.acquire('tag', 100);
    installInterruptHandlers(locks, new AbortController(), { target, exit: vi.fn() });

    target.emit('exit');

    expect(existsSync(store.pathFor('tag'))).toBe(false);
    expect(locks.isHeld('tag')).toBe(false);
  });

  it('should detach its listeners when disposed', () => {
    const dispose = installInterruptHandlers(locks, new AbortController(), { target });

    expect(target.listenerCount('SIGINT')).toBe(1);
    dispose();

    expect(target.listenerCount('SIGINT')).toBe(0);
    expect(target.listenerCount('SIGTERM')).toBe(0);
    expect(target.listenerCount('exit')).toBe(0);
  });
});
