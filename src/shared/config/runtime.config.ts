import { type AdmissionConfig, resolveAdmissionConfig } from "../../application/admission/admission.config";
import {
  type DownloaderConfig,
  defaultDownloaderConfig,
  validateDownloaderConfig
} from "../../application/download-chapter/downloader.config";
import {
  type ConsumerConfig,
  defaultConsumerConfig,
  resolveConsumerConfig
} from "../../application/queue-consumer/consumer.config";
import {
  defaultSourceRegistry,
  parseSourceRegistry,
  type SourceRegistry
} from "../../core/sources/resolveSource";
import type { IntRange } from "./ranges";

export const runtimeCaps = {
  defaultLimit: { min: 1, max: 10 },
  fanoutLimit: { min: 1, max: 64 },
  requestTimeoutMs: { min: 1000, max: 300000 },
  retryCount: { min: 0, max: 10 },
  retryDelayMs: { min: 0, max: 60000 },
  acquirePollMs: { min: 10, max: 60000 },
  acquireTimeoutMs: { min: 1000, max: 86400000 },
  popTimeoutSeconds: { min: 1, max: 300 },
  idleDelayMs: { min: 0, max: 60000 }
} as const;

export type RuntimeConfig = {
  admission: AdmissionConfig;
  downloader: DownloaderConfig;
  consumer: ConsumerConfig;
  sources: SourceRegistry;
};

const parseOptionalIntInRange = (env: NodeJS.ProcessEnv, name: string, range: IntRange): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const optionalString = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

export const loadRuntimeConfigFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
  outputRoot: string = defaultDownloaderConfig.outputRoot
): RuntimeConfig => {
  const admission = resolveAdmissionConfig({
    defaultLimit: parseOptionalIntInRange(env, "DL_DEFAULT_LIMIT", runtimeCaps.defaultLimit),
    pollIntervalMs: parseOptionalIntInRange(env, "DL_ACQUIRE_POLL_MS", runtimeCaps.acquirePollMs),
    acquireTimeoutMs: parseOptionalIntInRange(env, "DL_ACQUIRE_TIMEOUT_MS", runtimeCaps.acquireTimeoutMs)
  });

  const downloader = validateDownloaderConfig({
    outputRoot,
    fanoutLimit: parseOptionalIntInRange(env, "DL_FANOUT_LIMIT", runtimeCaps.fanoutLimit) ?? defaultDownloaderConfig.fanoutLimit,
    requestTimeoutMs:
      parseOptionalIntInRange(env, "DL_REQUEST_TIMEOUT_MS", runtimeCaps.requestTimeoutMs) ??
      defaultDownloaderConfig.requestTimeoutMs,
    retryCount: parseOptionalIntInRange(env, "DL_RETRY_COUNT", runtimeCaps.retryCount) ?? defaultDownloaderConfig.retryCount,
    retryDelayMs:
      parseOptionalIntInRange(env, "DL_RETRY_DELAY_MS", runtimeCaps.retryDelayMs) ?? defaultDownloaderConfig.retryDelayMs,
    userAgent: optionalString(env, "DL_USER_AGENT") ?? defaultDownloaderConfig.userAgent
  });

  const consumer = resolveConsumerConfig({
    queueName: optionalString(env, "DL_QUEUE_NAME") ?? defaultConsumerConfig.queueName,
    popTimeoutSeconds:
      parseOptionalIntInRange(env, "DL_QUEUE_POP_TIMEOUT_S", runtimeCaps.popTimeoutSeconds) ??
      defaultConsumerConfig.popTimeoutSeconds,
    idleDelayMs: parseOptionalIntInRange(env, "DL_IDLE_DELAY_MS", runtimeCaps.idleDelayMs) ?? defaultConsumerConfig.idleDelayMs
  });

  const rawSources = optionalString(env, "DL_SOURCE_HOSTS");
  const sources = rawSources ? parseSourceRegistry(rawSources) : defaultSourceRegistry;

  return { admission, downloader, consumer, sources };
};
