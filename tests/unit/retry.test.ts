import { computeBackoffMs, retry } from "../../src/shared/retry/retry";

type StatusError = Error & { status?: number };

const failWith = (status: number): StatusError => Object.assign(new Error(`status ${status}`), { status });

const noSleep = async () => undefined;

describe("retry", () => {
  it("retries transient failures then succeeds", async () => {
    let n = 0;
    const result = await retry(async () => {
      n += 1;
      if (n < 3) throw failWith(503);
      return "ok";
    }, {
      retries: 5,
      minDelayMs: 1,
      maxDelayMs: 5,
      shouldRetry: (e) => ((e as StatusError).status ?? 0) >= 500,
      sleepFn: noSleep
    });

    expect(result).toBe("ok");
    expect(n).toBe(3);
  });

  it("makes a single attempt when retries is 0", async () => {
    let attempts = 0;
    const giveUps: number[] = [];

    await expect(retry(async () => {
      attempts += 1;
      throw failWith(503);
    }, {
      retries: 0,
      minDelayMs: 1,
      maxDelayMs: 5,
      shouldRetry: () => true,
      onGiveUp: ({ attempt, maxAttempts }) => {
        giveUps.push(attempt, maxAttempts);
      }
    })).rejects.toThrow("status 503");

    expect(attempts).toBe(1);
    expect(giveUps).toEqual([1, 1]);
  });

  it("stops at the first non-retryable failure", async () => {
    let attempts = 0;
    await expect(retry(async () => {
      attempts += 1;
      throw new Error("fatal");
    }, {
      retries: 3,
      minDelayMs: 1,
      maxDelayMs: 10,
      shouldRetry: () => ({ retry: false })
    })).rejects.toThrow("fatal");

    expect(attempts).toBe(1);
  });

  it("doubles the delay per attempt and honours a requested delay", async () => {
    let attempts = 0;
    const delays: number[] = [];
    const slept: number[] = [];

    await retry(async () => {
      attempts += 1;
      if (attempts === 1) throw failWith(500);
      if (attempts === 2) throw failWith(500);
      if (attempts === 3) throw failWith(429);
      return "ok";
    }, {
      retries: 5,
      minDelayMs: 5,
      maxDelayMs: 50,
      jitterRatio: 0,
      shouldRetry: (e) => ((e as StatusError).status === 429 ? { retry: true, delayMs: 7 } : true),
      onRetry: ({ delayMs }) => {
        delays.push(delayMs);
      },
      sleepFn: async (ms) => {
        slept.push(ms);
      }
    });

    expect(delays).toEqual([5, 10, 7]);
    expect(slept).toEqual([5, 10, 7]);
  });
});

describe("computeBackoffMs", () => {
  it("caps at maxDelayMs before adding jitter", () => {
    expect(computeBackoffMs(10, { minDelayMs: 100, maxDelayMs: 1000, jitterRatio: 0.5, randomFn: () => 1 })).toBe(1500);
  });

  it("ignores negative or non-finite requested delays", () => {
    const opts = { minDelayMs: 4, maxDelayMs: 100, jitterRatio: 0 };
    expect(computeBackoffMs(1, opts, -1)).toBe(8);
    expect(computeBackoffMs(1, opts, Number.NaN)).toBe(8);
  });
});
