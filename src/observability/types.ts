export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  candidate?: string;
  url?: string;
  filePath?: string;
  error?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "candidates_read"
  | "unresolved"
  | "downloads_ok"
  | "downloads_failed"
  | "downloads_skipped"
  | "files_pruned";

export type MetricTimerName = "resolve_ms" | "download_ms";
