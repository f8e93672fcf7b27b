import { setTimeout as delay } from "node:timers/promises";

/** Injected wherever code waits, so tests can advance time without sleeping. */
export type Clock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

/** A clock whose `sleep` advances `now` instantly. */
export function createManualClock(startMs: number): Clock & { advance: (ms: number) => void } {
  let current = startMs;
  return {
    now: () => current,
    sleep: async (ms) => {
      current += Math.max(0, ms);
    },
    advance: (ms) => {
      current += ms;
    },
  };
}

export function isoTimestamp(ms: number) {
  return new Date(ms).toISOString();
}
