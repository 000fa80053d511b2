import type { DownloadResult } from "../types";

export interface Sink {
  publishDownloadResult(results: DownloadResult[]): Promise<void>;
}
