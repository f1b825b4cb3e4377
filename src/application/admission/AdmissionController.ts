import type { CounterStore } from "../../ports/CounterStore";
import type { OutcomeRecorder } from "../../ports/AssetFetcher";
import { ADMISSION_KEY_PATTERNS, admissionKeys, sourceFromAdmissionKey } from "../../core/admission/admissionKeys";
import {
  clampLimit,
  decayCounters,
  decayPolicy,
  errorRate,
  nextConcurrencyLimit,
  type OutcomeCounters
} from "../../core/admission/limitPolicy";
import { sleep } from "../../shared/time/sleep";
import { type AdmissionConfigInput, type AdmissionConfig, resolveAdmissionConfig } from "./admission.config";

export type SourceStats = {
  source: string;
  limit: number;
  active: number;
  successCount: number;
  errorCount: number;
  errorRatePercent: number;
};

export type LimitAdjustment = {
  previous: number;
  next: number;
};

export class AdmissionTimeoutError extends Error {
  readonly code = "admission_timeout";
  readonly context: { source: string; waitedMs: number };

  constructor(source: string, waitedMs: number) {
    super(`No admission slot for source=${source} after ${waitedMs}ms`);
    this.name = "AdmissionTimeoutError";
    this.context = { source, waitedMs };
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const parseCount = (raw: string | null): number => {
  if (raw == null) return 0;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : 0;
};

/**
 * Per-source admission control shared by every worker through the counter
 * store.
 *
 * `active <= limit` only holds on a best-effort basis: acquire reads both
 * counters and then increments, with no transaction around the three
 * commands, so two workers polling at the same moment can both take the last
 * slot. A lowered limit does not pre-empt existing holders either. Both cases
 * drain as jobs finish.
 */
export class AdmissionController implements OutcomeRecorder {
  private readonly config: AdmissionConfig;

  constructor(
    private readonly store: CounterStore,
    config: AdmissionConfigInput = {},
    private readonly deps: {
      randomFn?: () => number;
      sleepFn?: (ms: number) => Promise<void>;
      now?: () => number;
    } = {}
  ) {
    this.config = resolveAdmissionConfig(config);
  }

  async getLimit(source: string): Promise<number> {
    const raw = await this.store.get(admissionKeys(source).limit);
    if (raw == null) return this.config.defaultLimit;
    const value = Number.parseInt(raw, 10);
    return Number.isFinite(value) ? clampLimit(value) : this.config.defaultLimit;
  }

  async acquire(source: string): Promise<void> {
    const sleepFn = this.deps.sleepFn ?? sleep;
    const now = this.deps.now ?? Date.now;
    const key = admissionKeys(source).active;
    const startedAt = now();
    let logged = false;

    while (true) {
      const limit = await this.getLimit(source);
      const active = parseCount(await this.store.get(key));
      if (active < limit) {
        await this.store.incr(key);
        return;
      }

      const waitedMs = now() - startedAt;
      if (this.config.acquireTimeoutMs != null && waitedMs >= this.config.acquireTimeoutMs) {
        throw new AdmissionTimeoutError(source, waitedMs);
      }
      if (!logged) {
        logged = true;
        console.log(JSON.stringify({ event: "admission.waiting", source, active, limit }));
      }
      await sleepFn(this.config.pollIntervalMs);
    }
  }

  async release(source: string): Promise<void> {
    const key = admissionKeys(source).active;
    const remaining = await this.store.decr(key);
    if (remaining < 0) {
      // more releases than acquires, e.g. after a manual reset of the key.
      // undo only this DECR; a SET to 0 would also drop slots taken since
      await this.store.incr(key);
      console.warn(JSON.stringify({ event: "admission.release_underflow", source, remaining }));
    }
  }

  /**
   * Runs `task` while holding one slot of `source`. The slot is released on
   * every exit path.
   */
  async withSlot<T>(source: string, task: () => Promise<T>): Promise<T> {
    await this.acquire(source);
    try {
      return await task();
    } finally {
      await this.release(source);
    }
  }

  async recordOutcome(source: string, success: boolean): Promise<void> {
    const keys = admissionKeys(source);
    await this.store.incr(success ? keys.success : keys.error);

    const randomFn = this.deps.randomFn ?? Math.random;
    if (randomFn() < decayPolicy.probability) {
      const decayed = decayCounters(await this.readCounters(source));
      if (decayed) {
        await this.store.set(keys.success, decayed.success);
        await this.store.set(keys.error, decayed.error);
      }
    }

    await this.adjustLimit(source);
  }

  async adjustLimit(source: string): Promise<LimitAdjustment> {
    const counters = await this.readCounters(source);
    const previous = await this.getLimit(source);
    const next = nextConcurrencyLimit(previous, counters);
    if (next === previous) return { previous, next };

    await this.store.set(admissionKeys(source).limit, next);
    console.log(JSON.stringify({
      event: next < previous ? "admission.limit_lowered" : "admission.limit_raised",
      source,
      errorRate: Number(errorRate(counters).toFixed(3)),
      from: previous,
      to: next
    }));
    return { previous, next };
  }

  async readStats(source: string): Promise<SourceStats> {
    const counters = await this.readCounters(source);
    const limit = await this.getLimit(source);
    const active = parseCount(await this.store.get(admissionKeys(source).active));
    const total = counters.success + counters.error;

    return {
      source,
      limit,
      active,
      successCount: counters.success,
      errorCount: counters.error,
      errorRatePercent: total === 0 ? 0 : Math.round((counters.error / total) * 1000) / 10
    };
  }

  /**
   * Every source with any admission state: recorded outcomes, held slots or a
   * stored limit. A source starved before its first outcome shows up through
   * its active counter.
   */
  async listStats(): Promise<SourceStats[]> {
    const sources = new Set<string>();
    for (const pattern of ADMISSION_KEY_PATTERNS) {
      for (const key of await this.store.keys(pattern)) {
        const source = sourceFromAdmissionKey(key);
        if (source) sources.add(source);
      }
    }

    const ordered = Array.from(sources).sort();
    return Promise.all(ordered.map((source) => this.readStats(source)));
  }

  private async readCounters(source: string): Promise<OutcomeCounters> {
    const keys = admissionKeys(source);
    const success = parseCount(await this.store.get(keys.success));
    const error = parseCount(await this.store.get(keys.error));
    return { success, error };
  }
}
