import type { AssetFailureKind, AssetFetchResult } from "../../ports/AssetFetcher";
import type { FailedAsset } from "../../ports/JobReportRepository";

export type DownloadFailureCode = "destination_unavailable" | "outcome_report_failed";

export type DownloadErrorContext = {
  source: string;
  label: string;
  index?: number;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/**
 * One failed request for one asset. Carries what the retry policy and the
 * logs need, never the response body.
 */
export class AssetRequestError extends Error {
  readonly kind: AssetFailureKind;
  readonly status?: number;
  readonly retryDelayMs?: number;
  readonly requestUrl: string;

  constructor(args: { kind: AssetFailureKind; message: string; requestUrl: string; status?: number; retryDelayMs?: number; cause?: unknown }) {
    super(args.message);
    this.name = "AssetRequestError";
    this.kind = args.kind;
    this.status = args.status;
    this.retryDelayMs = args.retryDelayMs;
    this.requestUrl = args.requestUrl;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DownloadJobError extends Error {
  readonly code: DownloadFailureCode;
  readonly context: DownloadErrorContext;

  constructor(args: { code: DownloadFailureCode; message: string; context: DownloadErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "DownloadJobError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Errors raised by fs carry the failing syscall ("open", "write", "mkdir", ...).
export const isFilesystemError = (reason: unknown): boolean =>
  isRecord(reason) && typeof reason.syscall === "string" && typeof reason.code === "string";

export const toAssetRequestError = (reason: unknown, requestUrl: string): AssetRequestError => {
  if (reason instanceof AssetRequestError) return reason;
  if (isFilesystemError(reason)) {
    return new AssetRequestError({ kind: "filesystem", message: toErrorMessage(reason), requestUrl, cause: reason });
  }
  return new AssetRequestError({ kind: "network", message: toErrorMessage(reason), requestUrl, cause: reason });
};

/**
 * Transient failures are worth another attempt; a 4xx other than 429 or a
 * local disk problem will fail the same way again.
 */
export const shouldRetryAssetFailure = (reason: unknown): boolean | { retry: boolean; delayMs?: number } => {
  if (!(reason instanceof AssetRequestError)) return false;

  switch (reason.kind) {
    case "timeout":
    case "network":
      return true;
    case "filesystem":
      return false;
    case "http":
      if (reason.status === 429) return { retry: true, delayMs: reason.retryDelayMs };
      return typeof reason.status === "number" && reason.status >= 500;
  }
};

export const wrapDestinationFailure = (reason: unknown, context: DownloadErrorContext): DownloadJobError => {
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new DownloadJobError({
    code: "destination_unavailable",
    message: `Cannot prepare destination for source=${context.source}, label=${context.label}: ${toErrorMessage(reason)}`,
    context,
    cause
  });
};

export const wrapOutcomeReportFailure = (reason: unknown, context: DownloadErrorContext): DownloadJobError =>
  new DownloadJobError({
    code: "outcome_report_failed",
    message: `Asset outcome could not be recorded for source=${context.source}, label=${context.label}, index=${String(context.index)}: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });

export type ChapterDownloadSummary = {
  source: string;
  folder: string;
  total: number;
  done: number;
  downloaded: number;
  skipped: number;
  failed: FailedAsset[];
};

export const createChapterSummaryTracker = (source: string, folder: string, total: number) => {
  let downloaded = 0;
  let skipped = 0;
  const failed: FailedAsset[] = [];

  return {
    add: (index: number, result: AssetFetchResult) => {
      if (result.status === "downloaded") downloaded += 1;
      else if (result.status === "skipped") skipped += 1;
      else failed.push({ index, url: result.url, kind: result.kind });
    },
    summary: (): ChapterDownloadSummary => ({
      source,
      folder,
      total,
      done: downloaded + skipped,
      downloaded,
      skipped,
      failed: [...failed].sort((a, b) => a.index - b.index)
    })
  };
};
