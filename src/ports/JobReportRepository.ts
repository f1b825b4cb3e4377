import type { AssetFailureKind } from "./AssetFetcher";

export type JobReportStatus = "completed" | "partial" | "failed";

export type FailedAsset = {
  index: number;
  url: string;
  kind: AssetFailureKind;
};

export type JobReport = {
  jobKey: string;         // `${destinationRoot}/${label}`
  source: string;
  destinationRoot: string;
  label: string;
  status: JobReportStatus;
  total: number;
  done: number;
  failed: FailedAsset[];
  error?: { code?: string; message: string };
  startedAt: Date;
  finishedAt: Date;
};

export type DeadLetter = {
  queue: string;
  payload: string;
  reason: string;
  receivedAt: Date;
};

export interface JobReportRepository {
  recordJobReport(report: JobReport): Promise<void>;
  recordDeadLetter(entry: DeadLetter): Promise<void>;
}
