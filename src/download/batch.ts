import type { AppConfig } from "../config";
import type { FetchFn } from "../core/fetch";
import { errorMessage, type Logger, type MetricsRegistry } from "../observability";
import type { DocumentResolver, Resolution } from "../resolve";
import type { Sink } from "../sink";
import type { BatchSummary, DownloadResult } from "../types";
import { fetchDocument } from "./fetcher";

export interface BatchDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  resolver: DocumentResolver;
  sink: Sink;
  fetchFn?: FetchFn;
}

async function resolveCandidate(resolver: DocumentResolver, candidate: string): Promise<Resolution> {
  try {
    return await resolver.resolve(candidate);
  } catch (error) {
    return { kind: "unresolved", failure: "network", reason: errorMessage(error) };
  }
}

async function fetchCandidate(
  candidate: string,
  resolution: Exclude<Resolution, { kind: "unresolved" }>,
  deps: BatchDeps,
): Promise<DownloadResult> {
  const { config, logger, metrics } = deps;
  try {
    return await fetchDocument(
      {
        candidate,
        url: resolution.url,
        response: resolution.kind === "fetched" ? resolution.response : undefined,
      },
      config.outputDir,
      { config, logger, metrics, fetchFn: deps.fetchFn },
    );
  } catch (error) {
    logger.warn("batch_item_fetch_error", { candidate, url: resolution.url, error: errorMessage(error) });
    metrics.incrementCounter("downloads_failed");
    return {
      candidate,
      url: resolution.url,
      status: "download_failed",
      failure: "filesystem",
      error: errorMessage(error),
      finishedAt: new Date().toISOString(),
    };
  }
}

/**
 * Processes candidates strictly in order, one at a time. `maxDownloads` bounds
 * the number of files actually written in this run; skipped and failed items
 * do not count towards it.
 */
export async function runBatch(candidates: string[], deps: BatchDeps): Promise<BatchSummary> {
  const { config, logger, metrics, resolver, sink } = deps;
  const summary: BatchSummary = {
    processed: 0,
    downloaded: 0,
    skipped: 0,
    failed: 0,
    unresolved: 0,
    capReached: false,
  };

  for (const candidate of candidates) {
    if (summary.downloaded >= config.maxDownloads) {
      logger.warn("batch_cap_reached", {
        maxDownloads: config.maxDownloads,
        remaining: candidates.length - summary.processed,
      });
      summary.capReached = true;
      break;
    }

    summary.processed += 1;
    const stopTimer = metrics.startTimer("resolve_ms");
    const resolution = await resolveCandidate(resolver, candidate);
    stopTimer();

    let result: DownloadResult;
    if (resolution.kind === "unresolved") {
      logger.warn("batch_item_unresolved", {
        candidate,
        strategy: resolver.strategy,
        failure: resolution.failure,
        error: resolution.reason,
      });
      metrics.incrementCounter("unresolved");
      summary.unresolved += 1;
      result = {
        candidate,
        status: "unresolved",
        failure: resolution.failure,
        error: resolution.reason,
        finishedAt: new Date().toISOString(),
      };
    } else {
      logger.debug("batch_item_resolved", { candidate, url: resolution.url, strategy: resolver.strategy });
      result = await fetchCandidate(candidate, resolution, deps);

      if (result.status === "downloaded_ok") {
        summary.downloaded += 1;
      } else if (result.status === "skipped") {
        summary.skipped += 1;
      } else {
        summary.failed += 1;
      }
    }

    await sink.publishDownloadResult([result]);
  }

  logger.info("batch_complete", { ...summary, maxDownloads: config.maxDownloads });
  return summary;
}
