import { setTimeout as delay } from 'node:timers/promises';

/**
 * Time source for polling and retry backoff. Readings are in milliseconds.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms, signal) => delay(ms, undefined, { signal }),
};
