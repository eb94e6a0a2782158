import { setTimeout as delay } from 'node:timers/promises';

/**
 * Waits `ms`, resolving early (never rejecting) when `signal` aborts.
 */
export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export const timerSleeper: Sleeper = async (ms, signal) => {
  if (signal.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal.aborted) return;
    throw err;
  }
};
