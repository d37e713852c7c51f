export interface RuntimeClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: RuntimeClock = {
  now: () => Date.now(),
  sleep: (ms) =>
    new Promise((resolve) => {
      setTimeout(resolve, ms);
    }),
};

/** Recorded pauses are replayed, but never longer than `capMs`. */
export function clampDelay(delayMs: number | undefined, capMs: number): number {
  if (delayMs === undefined || !Number.isFinite(delayMs) || delayMs <= 0) {
    return 0;
  }
  return Math.min(delayMs, capMs);
}
