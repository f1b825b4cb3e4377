/**
 * Additive-increase / additive-decrease policy for per-source concurrency.
 * An error rate between 5% and 30% leaves the limit where it is.
 */
export const limitBounds = { min: 1, max: 10 } as const;

export const adjustmentPolicy = {
  minSignal: 10,
  backoffAboveErrorRate: 0.3,
  rampUpBelowErrorRate: 0.05
} as const;

export const decayPolicy = {
  probability: 0.1,
  threshold: 200
} as const;

export type OutcomeCounters = {
  success: number;
  error: number;
};

export const clampLimit = (value: number): number =>
  Math.min(limitBounds.max, Math.max(limitBounds.min, Math.trunc(value)));

export const errorRate = ({ success, error }: OutcomeCounters): number => {
  const total = success + error;
  return total === 0 ? 0 : error / total;
};

/**
 * Returns the limit that should follow `current`, or `current` itself when
 * there is not enough signal or the error rate sits inside the dead band.
 */
export const nextConcurrencyLimit = (current: number, counters: OutcomeCounters): number => {
  if (counters.success + counters.error < adjustmentPolicy.minSignal) return current;

  const rate = errorRate(counters);
  if (rate > adjustmentPolicy.backoffAboveErrorRate && current > limitBounds.min) {
    return current - 1;
  }
  if (rate < adjustmentPolicy.rampUpBelowErrorRate && current < limitBounds.max) {
    return current + 1;
  }
  return current;
};

// undefined means the counters are still small enough to keep
export const decayCounters = (counters: OutcomeCounters): OutcomeCounters | undefined => {
  if (counters.success + counters.error <= decayPolicy.threshold) return undefined;
  return {
    success: Math.floor(counters.success / 2),
    error: Math.floor(counters.error / 2)
  };
};
