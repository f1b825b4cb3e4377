import { assertIntegerInRange } from "../../shared/config/ranges";

export type ConsumerConfig = {
  queueName: string;
  popTimeoutSeconds: number;
  idleDelayMs: number;
};

export const defaultConsumerConfig: ConsumerConfig = {
  queueName: "download_jobs",
  popTimeoutSeconds: 5,
  idleDelayMs: 1000
};

export const consumerCaps = {
  popTimeoutSeconds: { min: 1, max: 300 },
  idleDelayMs: { min: 0, max: 60000 }
} as const;

export const resolveConsumerConfig = (input: Partial<ConsumerConfig> = {}): ConsumerConfig => {
  const config: ConsumerConfig = { ...defaultConsumerConfig, ...input };
  if (config.queueName.trim() === "") {
    throw new Error("queueName must not be empty");
  }
  assertIntegerInRange("popTimeoutSeconds", config.popTimeoutSeconds, consumerCaps.popTimeoutSeconds);
  assertIntegerInRange("idleDelayMs", config.idleDelayMs, consumerCaps.idleDelayMs);
  return config;
};
