import type http from "http";
import { AdmissionController } from "../application/admission/AdmissionController";
import { downloadChapter } from "../application/download-chapter/downloadChapter.usecase";
import { consumeJobs, type ConsumerRunSummary } from "../application/queue-consumer/consumeJobs.usecase";
import { HttpAssetFetcher } from "../infrastructure/http/HttpAssetFetcher";
import { MongoJobReportRepository } from "../infrastructure/mongo/MongoJobReportRepository";
import { RedisCounterStore } from "../infrastructure/redis/RedisCounterStore";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { createServer } from "../server";

export const runWorker = async (signal?: AbortSignal): Promise<ConsumerRunSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv(process.env, env.DOWNLOAD_DIR);

  const store = RedisCounterStore.fromUrl(env.REDIS_URL);
  const reports = new MongoJobReportRepository(env.MONGO_URI);
  const admission = new AdmissionController(store, runtime.admission);
  const fetcher = new HttpAssetFetcher(admission, {
    timeoutMs: runtime.downloader.requestTimeoutMs,
    retryCount: runtime.downloader.retryCount,
    retryDelayMs: runtime.downloader.retryDelayMs,
    userAgent: runtime.downloader.userAgent
  });

  try {
    return await consumeJobs({
      store,
      reports,
      runJob: (job) => downloadChapter({ job, admission, fetcher, config: runtime.downloader }),
      config: runtime.consumer,
      sources: runtime.sources,
      signal
    });
  } finally {
    await reports.close();
    await store.close();
  }
};

export const startStatsServer = (port: number): http.Server => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv(process.env, env.DOWNLOAD_DIR);
  const store = RedisCounterStore.fromUrl(env.REDIS_URL);
  const admission = new AdmissionController(store, runtime.admission);

  const server = createServer({ listStats: () => admission.listStats() });
  server.on("close", () => {
    store.close().catch((err: unknown) => {
      console.warn(JSON.stringify({ event: "stats.close_failed", message: err instanceof Error ? err.message : String(err) }));
    });
  });

  server.listen(port, () => {
    console.log(JSON.stringify({ event: "stats.listening", port }));
  });
  return server;
};
