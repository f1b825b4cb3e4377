import { assertIntegerInRange } from "../../shared/config/ranges";

export type DownloaderConfig = {
  outputRoot: string;
  fanoutLimit: number;
  requestTimeoutMs: number;
  retryCount: number;
  retryDelayMs: number;
  userAgent: string;
};

export type DownloaderConfigInput = Partial<DownloaderConfig>;

export const defaultDownloaderConfig: DownloaderConfig = {
  outputRoot: "./downloads",
  fanoutLimit: 8,
  requestTimeoutMs: 30000,
  retryCount: 0,
  retryDelayMs: 2000,
  userAgent: "Mozilla/5.0 (compatible; chapter-downloader/1.0)"
};

export const downloaderCaps = {
  fanoutLimit: { min: 1, max: 64 },
  requestTimeoutMs: { min: 1, max: 300000 },
  retryCount: { min: 0, max: 10 },
  retryDelayMs: { min: 0, max: 60000 }
} as const;

export const validateDownloaderConfig = (config: DownloaderConfig): DownloaderConfig => {
  assertIntegerInRange("fanoutLimit", config.fanoutLimit, downloaderCaps.fanoutLimit);
  assertIntegerInRange("requestTimeoutMs", config.requestTimeoutMs, downloaderCaps.requestTimeoutMs);
  assertIntegerInRange("retryCount", config.retryCount, downloaderCaps.retryCount);
  assertIntegerInRange("retryDelayMs", config.retryDelayMs, downloaderCaps.retryDelayMs);
  if (config.outputRoot.trim() === "") {
    throw new Error("outputRoot must not be empty");
  }
  return config;
};

export const resolveDownloaderConfig = (input: DownloaderConfigInput = {}): DownloaderConfig =>
  validateDownloaderConfig({ ...defaultDownloaderConfig, ...input });
