import { AdmissionTimeoutError } from "./admission/AdmissionController";
import { AssetRequestError, DownloadJobError } from "./download-chapter/download.error-handler";

export type FailureContext = Partial<{
  source: string;
  label: string;
  index: number;
  waitedMs: number;
}>;

/**
 * What a worker failure looks like in logs and job reports. Never carries
 * `cause`, which may hold response bodies or driver internals.
 */
export type FailureDescription = {
  name: string;
  message: string;
  code?: string;
  context?: FailureContext;
  status?: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const isFiniteNumber = (value: unknown): value is number => typeof value === "number" && Number.isFinite(value);

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

// Keeps only the known fields, so arbitrary objects hung on an error stay out of the logs.
const pickContext = (value: unknown): FailureContext | undefined => {
  if (!isRecord(value)) return undefined;

  const context: FailureContext = {};
  if (typeof value.source === "string") context.source = value.source;
  if (typeof value.label === "string") context.label = value.label;
  if (isFiniteNumber(value.index)) context.index = value.index;
  if (isFiniteNumber(value.waitedMs)) context.waitedMs = value.waitedMs;

  return Object.keys(context).length > 0 ? context : undefined;
};

const failureFields = (err: unknown): { code?: unknown; context?: unknown; status?: unknown } => {
  if (err instanceof DownloadJobError || err instanceof AdmissionTimeoutError) {
    return { code: err.code, context: err.context };
  }
  if (err instanceof AssetRequestError) {
    return { code: `asset_${err.kind}`, status: err.status };
  }
  // drivers and other libraries: take what they expose under the usual names
  return isRecord(err) ? { code: err.code, context: err.context, status: err.status } : {};
};

export const describeFailure = (err: unknown): FailureDescription => {
  const error = err instanceof Error ? err : new Error(String(err));
  const fields = failureFields(err);
  const description: FailureDescription = { name: error.name || "Error", message: error.message };

  if (typeof fields.code === "string") description.code = fields.code;
  const context = pickContext(fields.context);
  if (context) description.context = context;
  if (isFiniteNumber(fields.status)) description.status = fields.status;

  return description;
};
