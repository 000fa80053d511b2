import type { DownloadResult } from "../types";
import type { Sink } from "./types";

export class NoopSink implements Sink {
  async publishDownloadResult(_results: DownloadResult[]): Promise<void> {
    return;
  }
}
