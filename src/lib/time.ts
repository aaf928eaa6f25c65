/**
 * Timing helpers shared by the lock manager and the retry coordinator.
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Sleeps for `ms`, returning early (without throwing) when `signal` aborts.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = async (ms, signal) => {
  if (ms <= 0 || signal?.aborted) {
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      return;
    }
    throw error;
  }
};

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}
