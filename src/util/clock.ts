export interface Clock {
  /** Milliseconds on a monotonic-enough scale; only differences matter. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms: number) =>
    new Promise((resolve) => {
      setTimeout(resolve, Math.max(0, ms));
    })
};

export const formatSeconds = (ms: number): string => `${(ms / 1000).toFixed(1)}s`;
