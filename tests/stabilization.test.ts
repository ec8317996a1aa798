import { describe, expect, it } from "vitest";
import { withTimeout } from "../src/core/timing";
import { OperationTimeoutError } from "../src/extract/errors";
import { waitUntilStable } from "../src/extract/stabilization";
import { FakeClock } from "./helpers/fakes";

function sequence(values: number[]): { measure: () => number; calls: () => number } {
  let index = 0;
  return {
    measure: () => {
      const value = values[Math.min(index, values.length - 1)];
      index += 1;
      return value;
    },
    calls: () => index,
  };
}

const OPTIONS = { sampleIntervalMs: 300, requiredStableSamples: 3, timeoutMs: 15_000 };

describe("waitUntilStable", () => {
  it("needs three consecutive repeats after the last change", async () => {
    const source = sequence([10, 10, 10, 20, 20, 20, 20]);

    const result = await waitUntilStable(source.measure, OPTIONS, new FakeClock());

    expect(result.status).toBe("stabilized");
    expect(result.lastValue).toBe(20);
    expect(result.samples).toBe(7);
    expect(source.calls()).toBe(7);
  });

  it("does not stabilize on a run of only three equal readings", async () => {
    const source = sequence([10, 10, 10, 20, 21, 22, 23, 24]);

    const result = await waitUntilStable(source.measure, { ...OPTIONS, timeoutMs: 2_100 }, new FakeClock());

    expect(result.status).toBe("timedOut");
    expect(result.lastValue).toBe(24);
  });

  it("times out on content that keeps changing", async () => {
    let height = 0;
    const clock = new FakeClock();

    const result = await waitUntilStable(() => (height += 5), { ...OPTIONS, timeoutMs: 1_000 }, clock);

    expect(result.status).toBe("timedOut");
    expect(result.elapsedMs).toBe(1_000);
    expect(clock.sleeps).toEqual([300, 300, 300, 100]);
  });

  it("treats a region that never renders as stable at zero", async () => {
    const source = sequence([0]);
    const clock = new FakeClock();

    const result = await waitUntilStable(source.measure, OPTIONS, clock);

    expect(result).toMatchObject({ status: "stabilized", samples: 3, lastValue: 0, elapsedMs: 600 });
    expect(source.calls()).toBe(3);
    expect(clock.sleeps).toEqual([300, 300]);
  });

  it("accepts async measurements and propagates their errors", async () => {
    const clock = new FakeClock();
    const ok = await waitUntilStable(async () => 42, OPTIONS, clock);
    expect(ok).toMatchObject({ status: "stabilized", samples: 4, lastValue: 42, elapsedMs: 900 });

    await expect(
      waitUntilStable(
        async () => {
          throw new Error("gone");
        },
        OPTIONS,
        clock,
      ),
    ).rejects.toThrow("gone");
  });
});

describe("withTimeout", () => {
  it("resolves with the operation's value", async () => {
    await expect(withTimeout(Promise.resolve("done"), 1_000, "fast")).resolves.toBe("done");
  });

  it("rejects with OperationTimeoutError when the operation hangs", async () => {
    const hanging = new Promise<string>(() => undefined);
    const outcome = withTimeout(hanging, 10, "hanging_step");

    await expect(outcome).rejects.toBeInstanceOf(OperationTimeoutError);
    await expect(outcome).rejects.toThrow("hanging_step timed out after 10ms");
  });
});
