import type { CounterStore } from "../../ports/CounterStore";
import type { JobReport, JobReportRepository } from "../../ports/JobReportRepository";
import {
  type DownloadJob,
  type DownloadJobPayload,
  InvalidJobPayloadError,
  parseDownloadJobPayload,
  toDownloadJob
} from "../../core/jobs/DownloadJob";
import type { SourceRegistry } from "../../core/sources/resolveSource";
import { sleep } from "../../shared/time/sleep";
import type { ChapterDownloadSummary } from "../download-chapter/download.error-handler";
import { describeFailure, errorMessage } from "../failure";
import { type ConsumerConfig, resolveConsumerConfig } from "./consumer.config";

export type ConsumerRunSummary = {
  processed: number;
  failed: number;
  deadLettered: number;
};

export const jobKey = (job: Pick<DownloadJob, "destinationRoot" | "label">): string =>
  `${job.destinationRoot}/${job.label}`;

const baseReport = (job: DownloadJob, startedAt: Date) => ({
  jobKey: jobKey(job),
  source: job.source,
  destinationRoot: job.destinationRoot,
  label: job.label,
  startedAt,
  finishedAt: new Date()
});

export const buildCompletedReport = (job: DownloadJob, summary: ChapterDownloadSummary, startedAt: Date): JobReport => ({
  ...baseReport(job, startedAt),
  status: summary.done === summary.total ? "completed" : "partial",
  total: summary.total,
  done: summary.done,
  failed: summary.failed
});

const reportError = (err: unknown): { code?: string; message: string } => {
  const { code, message } = describeFailure(err);
  return code == null ? { message } : { code, message };
};

export const buildFailedReport = (job: DownloadJob, err: unknown, startedAt: Date): JobReport => ({
  ...baseReport(job, startedAt),
  status: "failed",
  total: job.assetUrls.length,
  done: 0,
  failed: [],
  error: reportError(err)
});

/**
 * Worker loop: pops one job at a time off the shared queue and runs it to
 * completion before taking the next one. Stops between jobs once `signal`
 * is aborted.
 *
 * Only counter store errors end the loop. A report or dead letter that cannot
 * be written is logged and the loop moves on.
 */
export const consumeJobs = async (deps: {
  store: CounterStore;
  reports: JobReportRepository;
  runJob: (job: DownloadJob) => Promise<ChapterDownloadSummary>;
  config?: Partial<ConsumerConfig>;
  sources?: SourceRegistry;
  signal?: AbortSignal;
  sleepFn?: (ms: number) => Promise<void>;
}): Promise<ConsumerRunSummary> => {
  const { store, reports, runJob, sources, signal } = deps;
  const config = resolveConsumerConfig(deps.config);
  const sleepFn = deps.sleepFn ?? sleep;
  const summary: ConsumerRunSummary = { processed: 0, failed: 0, deadLettered: 0 };

  console.log(JSON.stringify({ event: "worker.started", queue: config.queueName }));

  while (!signal?.aborted) {
    const payload = await store.blockingPop(config.queueName, config.popTimeoutSeconds);
    if (payload == null) {
      await sleepFn(config.idleDelayMs);
      continue;
    }

    let job: DownloadJob;
    try {
      job = parseDownloadJobPayload(payload, sources);
    } catch (err) {
      if (!(err instanceof InvalidJobPayloadError)) throw err;
      try {
        await reports.recordDeadLetter({
          queue: config.queueName,
          payload,
          reason: err.message,
          receivedAt: new Date()
        });
      } catch (writeErr) {
        // the entry is already off the queue; the log line is all that is left of it
        console.error(JSON.stringify({
          event: "job.dead_letter_failed",
          queue: config.queueName,
          reason: err.message,
          payload,
          message: errorMessage(writeErr)
        }));
        continue;
      }
      summary.deadLettered += 1;
      console.warn(JSON.stringify({ event: "job.dead_lettered", queue: config.queueName, reason: err.message }));
      continue;
    }

    const startedAt = new Date();
    let report: JobReport;
    try {
      const result = await runJob(job);
      report = buildCompletedReport(job, result, startedAt);
      summary.processed += 1;
    } catch (err) {
      report = buildFailedReport(job, err, startedAt);
      summary.failed += 1;
      console.error(JSON.stringify({
        event: "job.failed",
        source: job.source,
        label: job.label,
        ...report.error
      }));
    }
    try {
      await reports.recordJobReport(report);
    } catch (writeErr) {
      console.error(JSON.stringify({
        event: "job.report_failed",
        jobKey: report.jobKey,
        status: report.status,
        message: errorMessage(writeErr)
      }));
    }
  }

  console.log(JSON.stringify({ event: "worker.stopped", ...summary }));
  return summary;
};

/**
 * Producer side of the queue. Validates with the same decoder the consumer
 * uses, so a malformed job is rejected before it is ever queued.
 */
export const enqueueDownloadJob = async (
  store: CounterStore,
  payload: DownloadJobPayload,
  queueName = resolveConsumerConfig().queueName
): Promise<number> => {
  toDownloadJob(payload);
  return store.push(queueName, JSON.stringify(payload));
};
