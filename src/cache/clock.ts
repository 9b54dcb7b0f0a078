import { abortableSleep } from '../utils/abort.js';

/**
 * Time source for the gate. Injected so tests can run retries and rate
 * limiting without real waiting.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => abortableSleep(ms, signal),
};
