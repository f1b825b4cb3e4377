import { sleep } from "../time/sleep";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;          // extra attempts after the first one; 0 disables retrying
  minDelayMs: number;       // backoff base, doubled per attempt
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryContext) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleepFn?: (ms: number) => Promise<void>;
};

const normalizeDecision = (decision: RetryDecision): { retry: boolean; delayMs?: number } =>
  typeof decision === "boolean" ? { retry: decision } : decision;

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">,
  requestedDelayMs?: number
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const requested =
    typeof requestedDelayMs === "number" && Number.isFinite(requestedDelayMs) && requestedDelayMs >= 0
      ? requestedDelayMs
      : undefined;
  const base = Math.min(maxDelayMs, requested ?? minDelayMs * Math.pow(2, attempt));
  const jitter = Math.floor(base * clampUnit(jitterRatio) * clampUnit(randomFn()));
  return base + jitter;
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, sleepFn = sleep } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = normalizeDecision(shouldRetry(err));
      if (attempt >= retries || !decision.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const delayMs = computeBackoffMs(attempt, opts, decision.delayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleepFn(delayMs);
    }
  }
};
