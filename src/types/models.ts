export type FailureKind = "resolution" | "network" | "filesystem" | "verification";

export interface DownloadResult {
  candidate: string;
  url?: string;
  status: "downloaded_ok" | "download_failed" | "skipped" | "unresolved";
  failure?: FailureKind;
  filePath?: string;
  bytes?: number;
  sha256?: string;
  contentType?: string;
  error?: string;
  finishedAt: string;
}

export interface BatchSummary {
  processed: number;
  downloaded: number;
  skipped: number;
  failed: number;
  unresolved: number;
  capReached: boolean;
}

export interface PruneSummary {
  scanned: number;
  removed: string[];
  freedBytes: number;
}
