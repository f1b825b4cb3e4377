import { isHttpUrl, resolveSource, type SourceRegistry } from "../sources/resolveSource";

/**
 * Wire shape pushed onto the download queue by producers.
 */
export type DownloadJobPayload = {
  destination_root: string;
  job_label: string;
  ordered_asset_urls: string[];
  origin_url_or_source_tag?: string | null;
  fanout_limit?: number;
};

export type DownloadJob = {
  destinationRoot: string;
  label: string;
  assetUrls: string[];
  origin?: string;
  // resolved from `origin`, `global` when nothing matches
  source: string;
  fanoutLimit?: number;
  // set when the origin is a page URL; sent as Referer with every asset request
  referer?: string;
};

export const fanoutLimitRange = { min: 1, max: 64 } as const;

export class InvalidJobPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidJobPayloadError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const requireNonEmptyString = (record: Record<string, unknown>, field: string): string => {
  const value = record[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidJobPayloadError(`Invalid job: ${field} must be a non-empty string`);
  }
  return value.trim();
};

const parseLabel = (record: Record<string, unknown>): string => {
  const label = requireNonEmptyString(record, "job_label");
  if (label === "." || label === ".." || /[\\/]/.test(label)) {
    throw new InvalidJobPayloadError("Invalid job: job_label must be a single path segment");
  }
  return label;
};

const parseAssetUrls = (value: unknown): string[] => {
  if (!Array.isArray(value)) {
    throw new InvalidJobPayloadError("Invalid job: ordered_asset_urls must be an array");
  }
  return value.map((url, index) => {
    if (typeof url !== "string" || url.trim() === "") {
      throw new InvalidJobPayloadError(`Invalid job: ordered_asset_urls[${index}] must be a non-empty string`);
    }
    return url.trim();
  });
};

const parseOrigin = (value: unknown): string | undefined => {
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new InvalidJobPayloadError("Invalid job: origin_url_or_source_tag must be a string");
  }
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

const parseFanoutLimit = (value: unknown): number | undefined => {
  if (value == null) return undefined;
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < fanoutLimitRange.min ||
    value > fanoutLimitRange.max
  ) {
    throw new InvalidJobPayloadError(
      `Invalid job: fanout_limit must be an integer in [${fanoutLimitRange.min}..${fanoutLimitRange.max}]`
    );
  }
  return value;
};

export const toDownloadJob = (raw: unknown, registry?: SourceRegistry): DownloadJob => {
  if (!isRecord(raw)) {
    throw new InvalidJobPayloadError("Invalid job: payload must be a JSON object");
  }

  const origin = parseOrigin(raw.origin_url_or_source_tag);
  const job: DownloadJob = {
    destinationRoot: requireNonEmptyString(raw, "destination_root"),
    label: parseLabel(raw),
    assetUrls: parseAssetUrls(raw.ordered_asset_urls),
    source: resolveSource(origin, registry)
  };

  if (origin != null) job.origin = origin;
  if (isHttpUrl(origin)) job.referer = origin;
  const fanoutLimit = parseFanoutLimit(raw.fanout_limit);
  if (fanoutLimit != null) job.fanoutLimit = fanoutLimit;

  return job;
};

/**
 * Decodes one queue entry. Never evaluates the payload; anything that is not
 * a well-formed job raises InvalidJobPayloadError.
 */
export const parseDownloadJobPayload = (payload: string, registry?: SourceRegistry): DownloadJob => {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidJobPayloadError(`Invalid job: payload is not JSON (${reason})`);
  }
  return toDownloadJob(raw, registry);
};
