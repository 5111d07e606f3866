import { TimeoutError } from "./errors.js";

/** Time source for every bounded wait. Tests swap in a manual clock. */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) =>
    new Promise<void>((resolve) => {
      if (ms <= 0) {
        resolve();
        return;
      }
      const timer = setTimeout(resolve, ms);
      timer.unref();
    }),
};

/**
 * Races a promise against a timeout. Rejects with a TimeoutError if the
 * timeout fires first; the timer is always cleaned up.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label = "Operation",
): Promise<T> {
  if (ms <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
    timer.unref();
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

/** Milliseconds left before `deadline`, never negative. */
export function remainingMs(clock: Clock, deadline: number): number {
  return Math.max(0, deadline - clock.now());
}
