import { describe, it, expect, vi } from "vitest";
import { ConciergeError } from "@concierge/types";
import { Deadline, backoffDelay, retryWithBackoff, withTimeout } from "./retry.js";

const noSleep = vi.fn(async (_ms: number) => undefined);

describe("retryWithBackoff", () => {
  it("retries retryable errors and returns the first success", async () => {
    let calls = 0;
    const delays: number[] = [];

    const result = await retryWithBackoff(
      async () => {
        calls++;
        if (calls < 3) throw new ConciergeError("PROVIDER_UNAVAILABLE", "503");
        return "ok";
      },
      {
        policy: { retries: 2, baseDelayMs: 100, maxDelayMs: 1000 },
        sleep: async (ms) => {
          delays.push(ms);
        },
      }
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it("gives up after the configured retries", async () => {
    const fn = vi.fn(async () => {
      throw new ConciergeError("PROVIDER_UNAVAILABLE", "timeout");
    });

    await expect(
      retryWithBackoff(fn, { policy: { retries: 2 }, sleep: noSleep })
    ).rejects.toMatchObject({ code: "PROVIDER_UNAVAILABLE" });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry non-retryable errors", async () => {
    const fn = vi.fn(async () => {
      throw new ConciergeError("PROTOCOL_VIOLATION", "bad payload");
    });

    await expect(retryWithBackoff(fn, { sleep: noSleep })).rejects.toMatchObject({
      code: "PROTOCOL_VIOLATION",
    });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("caps the backoff delay", () => {
    const policy = { retries: 10, baseDelayMs: 250, maxDelayMs: 2000 };
    expect([1, 2, 3, 4, 5].map((a) => backoffDelay(policy, a))).toEqual([
      250, 500, 1000, 2000, 2000,
    ]);
  });
});

describe("withTimeout", () => {
  it("aborts the work and rejects with the timeout error", async () => {
    let aborted = false;
    const pending = withTimeout(
      (signal) =>
        new Promise<string>((resolve) => {
          signal.addEventListener("abort", () => {
            aborted = true;
            resolve("late");
          });
        }),
      5,
      () => new ConciergeError("PROVIDER_UNAVAILABLE", "timed out")
    );

    await expect(pending).rejects.toMatchObject({ message: "timed out" });
    expect(aborted).toBe(true);
  });

  it("resolves with the work's result when it is fast enough", async () => {
    await expect(
      withTimeout(async () => 42, 1000, () => new Error("too slow"))
    ).resolves.toBe(42);
  });
});

describe("Deadline", () => {
  it("reports remaining budget from the injected clock", () => {
    let now = 1_000;
    const deadline = new Deadline(500, () => now);

    expect(deadline.remainingMs()).toBe(500);
    now = 1_400;
    expect(deadline.remainingMs()).toBe(100);
    expect(deadline.expired()).toBe(false);
    now = 1_600;
    expect(deadline.remainingMs()).toBe(0);
    expect(deadline.expired()).toBe(true);
  });

  it("rejects with TURN_TIMEOUT when the budget runs out first", async () => {
    const deadline = new Deadline(5);
    const never = new Promise<string>(() => undefined);

    await expect(deadline.race(never)).rejects.toMatchObject({ code: "TURN_TIMEOUT" });
  });

  it("aborts its signal with the timeout error when a race is lost", async () => {
    const deadline = new Deadline(5);
    expect(deadline.signal.aborted).toBe(false);

    await deadline.race(new Promise<string>(() => undefined)).catch(() => undefined);

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.signal.reason).toMatchObject({ code: "TURN_TIMEOUT" });
  });

  it("leaves its signal alone when the work wins", async () => {
    const deadline = new Deadline(1_000);

    await expect(deadline.race(Promise.resolve("done"))).resolves.toBe("done");

    expect(deadline.signal.aborted).toBe(false);
  });
});
