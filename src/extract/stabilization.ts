import type { Clock } from "../core/timing";
import { systemClock } from "../core/timing";

export interface StabilizationOptions {
  sampleIntervalMs: number;
  requiredStableSamples: number;
  timeoutMs: number;
}

export interface StabilizationResult {
  status: "stabilized" | "timedOut";
  samples: number;
  lastValue: number;
  elapsedMs: number;
}

/**
 * Polls `measure` until `requiredStableSamples` consecutive readings each
 * equal the one before them, or until `timeoutMs` elapses. Any change
 * resets the count. The first reading is compared against 0, so a region
 * that never renders is stable after `requiredStableSamples` readings.
 *
 * A timeout is a normal result: the caller proceeds with whatever rendered.
 * Errors thrown by `measure` are not caught here.
 */
export async function waitUntilStable(
  measure: () => number | Promise<number>,
  options: StabilizationOptions,
  clock: Clock = systemClock,
): Promise<StabilizationResult> {
  const startedAt = clock.now();
  let previous = 0;
  let stableCount = 0;
  let samples = 0;

  while (true) {
    const value = await measure();
    samples += 1;

    if (value === previous) {
      stableCount += 1;
    } else {
      stableCount = 0;
    }
    previous = value;

    const elapsedMs = clock.now() - startedAt;
    if (stableCount >= options.requiredStableSamples) {
      return { status: "stabilized", samples, lastValue: value, elapsedMs };
    }
    if (elapsedMs >= options.timeoutMs) {
      return { status: "timedOut", samples, lastValue: value, elapsedMs };
    }

    await clock.sleep(Math.min(options.sampleIntervalMs, Math.max(options.timeoutMs - elapsedMs, 0)));
  }
}
