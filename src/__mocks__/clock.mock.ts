import type { Clock, Sleep } from '../types/index.js';

/**
 * Manually driven clock. `sleep` advances time instantly and records the
 * requested delays.
 */
export interface ManualClock {
  now: Clock;
  sleep: Sleep;
  advance(ms: number): void;
  readonly sleeps: number[];
}

export function createManualClock(startMs: number = 0): ManualClock {
  let current = startMs;
  const sleeps: number[] = [];

  return {
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
    advance(ms: number) {
      current += ms;
    },
    sleeps,
  };
}
