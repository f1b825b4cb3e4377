export type AssetFailureKind = "timeout" | "http" | "network" | "filesystem";

export type AssetFetchRequest = {
  url: string;
  destPath: string;
  source: string;
  referer?: string;
};

export type AssetFetchResult =
  | { status: "downloaded"; url: string; destPath: string; bytes: number }
  | { status: "skipped"; url: string; destPath: string }
  | { status: "failed"; url: string; destPath: string; kind: AssetFailureKind; message: string; httpStatus?: number };

export interface AssetFetcher {
  fetchAsset(request: AssetFetchRequest): Promise<AssetFetchResult>;
}

export interface OutcomeRecorder {
  recordOutcome(source: string, success: boolean): Promise<void>;
}
