import { createWriteStream } from "fs";
import { stat } from "fs/promises";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import type {
  AssetFetcher,
  AssetFetchRequest,
  AssetFetchResult,
  OutcomeRecorder
} from "../../ports/AssetFetcher";
import {
  AssetRequestError,
  shouldRetryAssetFailure,
  toAssetRequestError
} from "../../application/download-chapter/download.error-handler";
import { retry } from "../../shared/retry/retry";

export type HttpAssetFetcherOptions = {
  timeoutMs: number;
  retryCount: number;
  retryDelayMs: number;
  userAgent: string;
  sleepFn?: (ms: number) => Promise<void>;
};

const MAX_RETRY_DELAY_MS = 30000;

export const sanitizeUrl = (raw: string): string => {
  try {
    const url = new URL(raw);
    return `${url.origin}${url.pathname}${url.search}`;
  } catch {
    return "<invalid url>";
  }
};

const hasContent = async (destPath: string): Promise<boolean> => {
  try {
    const info = await stat(destPath);
    return info.isFile() && info.size > 0;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
};

const parseRetryAfterMs = (header: string | null): number | undefined =>
  header != null && /^\d+$/.test(header) ? Number(header) * 1000 : undefined;

/**
 * Streams one asset to disk with Node's fetch.
 *
 * A file that already exists with a non-zero size is taken as downloaded and
 * no request is made. That is the only integrity check: a transfer that fails
 * half way leaves its partial file behind, and a later run will skip it.
 */
export class HttpAssetFetcher implements AssetFetcher {
  constructor(
    private readonly outcomes: OutcomeRecorder,
    private readonly options: HttpAssetFetcherOptions
  ) {}

  async fetchAsset(request: AssetFetchRequest): Promise<AssetFetchResult> {
    const { url, destPath, source } = request;
    const safeUrl = sanitizeUrl(url);
    let result: AssetFetchResult;

    try {
      if (await hasContent(destPath)) {
        return { status: "skipped", url, destPath };
      }

      const bytes = await retry(() => this.download(request, safeUrl), {
        retries: this.options.retryCount,
        minDelayMs: this.options.retryDelayMs,
        maxDelayMs: Math.max(this.options.retryDelayMs, MAX_RETRY_DELAY_MS),
        shouldRetry: shouldRetryAssetFailure,
        sleepFn: this.options.sleepFn,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          const assetError = toAssetRequestError(error, safeUrl);
          console.warn(JSON.stringify({
            event: "asset.retry",
            source,
            kind: assetError.kind,
            status: assetError.status ?? null,
            url: safeUrl,
            attempt,
            maxAttempts,
            delayMs
          }));
        }
      });
      result = { status: "downloaded", url, destPath, bytes };
    } catch (err) {
      const assetError = toAssetRequestError(err, safeUrl);
      console.warn(JSON.stringify({
        event: "asset.failed",
        source,
        kind: assetError.kind,
        status: assetError.status ?? null,
        url: safeUrl,
        message: assetError.message
      }));
      result = {
        status: "failed",
        url,
        destPath,
        kind: assetError.kind,
        message: assetError.message,
        ...(assetError.status != null ? { httpStatus: assetError.status } : {})
      };
    }

    await this.outcomes.recordOutcome(source, result.status === "downloaded");
    return result;
  }

  private async download(request: AssetFetchRequest, safeUrl: string): Promise<number> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const headers: Record<string, string> = { "User-Agent": this.options.userAgent };
    if (request.referer) headers.Referer = request.referer;

    try {
      const res = await fetch(request.url, { headers, signal: controller.signal });

      if (!res.ok || res.body == null) {
        await res.body?.cancel().catch(() => undefined);
        throw new AssetRequestError({
          kind: "http",
          message: `Asset request failed: ${res.status}`,
          status: res.status,
          retryDelayMs: res.status === 429 ? parseRetryAfterMs(res.headers.get("retry-after")) : undefined,
          requestUrl: safeUrl
        });
      }

      const file = createWriteStream(request.destPath);
      await pipeline(Readable.fromWeb(res.body), file);
      return file.bytesWritten;
    } catch (err) {
      if (controller.signal.aborted) {
        throw new AssetRequestError({
          kind: "timeout",
          message: `Asset request timeout after ${this.options.timeoutMs}ms`,
          requestUrl: safeUrl,
          cause: err
        });
      }
      throw toAssetRequestError(err, safeUrl);
    } finally {
      clearTimeout(timeout);
    }
  }
}
