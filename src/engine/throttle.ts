/**
 * Order throttle
 *
 * Keeps consecutive order submissions at least a fixed interval apart
 * so a run never bursts the broker's rate limit.
 */

export interface OrderThrottle {
  /** Resolves once the next submission may go out */
  acquire(): Promise<void>;
}

export interface ThrottleClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

const systemClock: ThrottleClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export function fixedIntervalThrottle(
  intervalMs: number,
  clock: ThrottleClock = systemClock
): OrderThrottle {
  let lastAcquired: number | null = null;

  return {
    async acquire(): Promise<void> {
      if (lastAcquired !== null) {
        const elapsed = clock.now() - lastAcquired;
        if (elapsed < intervalMs) {
          await clock.sleep(intervalMs - elapsed);
        }
      }
      lastAcquired = clock.now();
    },
  };
}

export const noThrottle: OrderThrottle = {
  acquire: async () => {},
};
