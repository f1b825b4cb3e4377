import { mkdir } from "fs/promises";
import path from "path";
import type { AssetFetcher } from "../../ports/AssetFetcher";
import type { DownloadJob } from "../../core/jobs/DownloadJob";
import { assetFileName } from "../../core/jobs/assetNaming";
import { createLimiter } from "../../shared/concurrency/limiter";
import type { AdmissionController } from "../admission/AdmissionController";
import { type DownloaderConfigInput, resolveDownloaderConfig } from "./downloader.config";
import {
  type ChapterDownloadSummary,
  createChapterSummaryTracker,
  wrapDestinationFailure,
  wrapOutcomeReportFailure
} from "./download.error-handler";

export type SlotGate = Pick<AdmissionController, "withSlot">;

export const resolveJobFolder = (outputRoot: string, job: Pick<DownloadJob, "destinationRoot" | "label">): string =>
  path.resolve(outputRoot, job.destinationRoot, job.label);

/**
 * Downloads every asset of one job while holding a single admission slot of
 * the job's source.
 *
 * Two caps apply: the source slot bounds how many jobs of that source run
 * across all workers, the fan-out limiter bounds how many assets of this job
 * are in flight at once.
 */
export const downloadChapter = async (
  deps: { job: DownloadJob; admission: SlotGate; fetcher: AssetFetcher; config?: DownloaderConfigInput }
): Promise<ChapterDownloadSummary> => {
  const { job, admission, fetcher } = deps;
  const config = resolveDownloaderConfig(deps.config);
  const { source, label } = job;
  const folder = resolveJobFolder(config.outputRoot, job);

  return admission.withSlot(source, async () => {
    try {
      await mkdir(folder, { recursive: true });
    } catch (error) {
      throw wrapDestinationFailure(error, { source, label });
    }

    const limit = createLimiter(job.fanoutLimit ?? config.fanoutLimit);
    const tracker = createChapterSummaryTracker(source, folder, job.assetUrls.length);

    const settled = await Promise.allSettled(
      job.assetUrls.map((url, i) =>
        limit(() =>
          fetcher.fetchAsset({
            url,
            destPath: path.join(folder, assetFileName(i + 1, url)),
            source,
            referer: job.referer
          })
        )
      )
    );

    settled.forEach((result, i) => {
      if (result.status === "fulfilled") {
        tracker.add(i + 1, result.value);
      }
    });

    // The fetcher only rejects when its outcome could not be recorded, which
    // means the counter store itself is unavailable.
    const unreported = settled.findIndex((result) => result.status === "rejected");
    const rejected = settled[unreported];
    if (rejected?.status === "rejected") {
      throw wrapOutcomeReportFailure(rejected.reason, { source, label, index: unreported + 1 });
    }

    const summary = tracker.summary();
    console.log(JSON.stringify({
      event: "job.completed",
      source,
      label,
      done: summary.done,
      total: summary.total,
      downloaded: summary.downloaded,
      skipped: summary.skipped,
      failed: summary.failed.length
    }));
    return summary;
  });
};
