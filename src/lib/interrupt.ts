/**
 * SIGINT/SIGTERM handling for CLI runs.
 *
 * The first signal aborts the running operation, whose `finally` releases its
 * lock. A second signal releases every held lock synchronously and exits 130.
 * A process `exit` hook releases anything still held.
 */

import type { LogSink } from '../types/sinks.js';
import type { LockManager } from './lock_manager.js';
import { nullLogSink } from './log.js';

export const INTERRUPT_EXIT_CODE = 130;

type InterruptEvent = 'SIGINT' | 'SIGTERM' | 'exit';

/**
 * The part of `process` the handlers attach to.
 */
export interface SignalTarget {
  on(event: InterruptEvent, listener: () => void): unknown;
  off(event: InterruptEvent, listener: () => void): unknown;
}

export interface InterruptOptions {
  logger?: LogSink;
  target?: SignalTarget;
  exit?: (code: number) => void;
}

/**
 * Installs the handlers. Returns a function that removes them.
 */
export function installInterruptHandlers(
  locks: LockManager,
  controller: AbortController,
  options: InterruptOptions = {}
): () => void {
  const logger = options.logger ?? nullLogSink;
  const target = options.target ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let signalCount = 0;

  const releaseHeld = (): void => {
    try {
      locks.releaseAllSync();
    } catch (error) {
      logger.log('ERROR', 'Failed to release locks on exit', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };

  const onSignal = (signal: 'SIGINT' | 'SIGTERM'): void => {
    signalCount++;
    if (signalCount === 1) {
      logger.log('WARN', `${signal} received, aborting current operation...`);
      controller.abort();
      return;
    }
    logger.log('WARN', 'Force exit');
    releaseHeld();
    exit(INTERRUPT_EXIT_CODE);
  };

  const sigintHandler = (): void => onSignal('SIGINT');
  const sigtermHandler = (): void => onSignal('SIGTERM');

  target.on('SIGINT', sigintHandler);
  target.on('SIGTERM', sigtermHandler);
  target.on('exit', releaseHeld);

  return () => {
    target.off('SIGINT', sigintHandler);
    target.off('SIGTERM', sigtermHandler);
    target.off('exit', releaseHeld);
  };
}
