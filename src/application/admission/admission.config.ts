import { limitBounds } from "../../core/admission/limitPolicy";
import { assertIntegerInRange } from "../../shared/config/ranges";

export type AdmissionConfig = {
  defaultLimit: number;
  pollIntervalMs: number;
  // unset: acquire waits for a free slot forever
  acquireTimeoutMs?: number;
};

export type AdmissionConfigInput = Partial<AdmissionConfig>;

export const defaultAdmissionConfig: AdmissionConfig = {
  defaultLimit: 3,
  pollIntervalMs: 1000
};

export const admissionCaps = {
  defaultLimit: limitBounds,
  pollIntervalMs: { min: 1, max: 60000 },
  acquireTimeoutMs: { min: 1, max: 86400000 }
} as const;

export const resolveAdmissionConfig = (input: AdmissionConfigInput = {}): AdmissionConfig => {
  const config: AdmissionConfig = {
    defaultLimit: input.defaultLimit ?? defaultAdmissionConfig.defaultLimit,
    pollIntervalMs: input.pollIntervalMs ?? defaultAdmissionConfig.pollIntervalMs
  };
  if (input.acquireTimeoutMs != null) config.acquireTimeoutMs = input.acquireTimeoutMs;
  assertIntegerInRange("defaultLimit", config.defaultLimit, admissionCaps.defaultLimit);
  assertIntegerInRange("pollIntervalMs", config.pollIntervalMs, admissionCaps.pollIntervalMs);
  if (config.acquireTimeoutMs != null) {
    assertIntegerInRange("acquireTimeoutMs", config.acquireTimeoutMs, admissionCaps.acquireTimeoutMs);
  }
  return config;
};
