import fs from "node:fs";
import path from "node:path";
import type { DownloadResult } from "../types";
import type { Sink } from "./types";

/** Appends one JSON line per item result, tagged with the run id. */
export class LocalJsonlSink implements Sink {
  private readonly manifestPath: string;
  private readonly runId: string;

  constructor(manifestPath: string, runId: string) {
    this.manifestPath = path.resolve(manifestPath);
    fs.mkdirSync(path.dirname(this.manifestPath), { recursive: true });
    this.runId = runId;
  }

  async publishDownloadResult(results: DownloadResult[]): Promise<void> {
    await this.appendLines(
      results.map((result) => ({
        runId: this.runId,
        ...result,
      })),
    );
  }

  private async appendLines(records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(this.manifestPath, content, "utf-8");
  }
}
