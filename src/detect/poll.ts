import type { Clock } from "../util/clock.js";

export type Detection<T> = { state: "detected"; value: T } | { state: "pending" };

export interface Detector<S, T> {
  /** Samples required before a timeout may be declared, so `-t 0` still gets a fair look. */
  readonly minSamples: number;
  observe(sample: S, now: number): Detection<T>;
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  clock: Clock;
}

export type WaitOutcome<T> =
  | { status: "detected"; value: T; elapsedMs: number; samples: number }
  | { status: "timeout"; elapsedMs: number; samples: number };

export const pending = <T>(): Detection<T> => ({ state: "pending" });

export const detected = <T>(value: T): Detection<T> => ({ state: "detected", value });

/**
 * Samples until the detector fires or the deadline passes. The final sleep is
 * clipped to the deadline so the last sample lands on it.
 */
export const pollUntil = async <S, T>(
  sample: () => Promise<S>,
  detector: Detector<S, T>,
  options: PollOptions
): Promise<WaitOutcome<T>> => {
  const { clock, intervalMs, timeoutMs } = options;
  const startedAt = clock.now();
  let samples = 0;

  for (;;) {
    const current = await sample();
    samples += 1;
    const now = clock.now();
    const detection = detector.observe(current, now);
    const elapsedMs = now - startedAt;
    if (detection.state === "detected") {
      return { status: "detected", value: detection.value, elapsedMs, samples };
    }
    if (elapsedMs >= timeoutMs && samples >= detector.minSamples) {
      return { status: "timeout", elapsedMs, samples };
    }
    const remaining = timeoutMs - elapsedMs;
    await clock.sleep(remaining > 0 ? Math.min(intervalMs, remaining) : 0);
  }
};
