import type { AppConfig } from "../config";
import { deriveTarget, runBatch } from "../download";
import { megabytesToBytes, pruneOversizedFiles } from "../housekeeping";
import { readCandidates } from "../input/candidates";
import type { Logger, MetricsRegistry } from "../observability";
import { createResolver, resolveDocumentUrl } from "../resolve";
import type { Sink } from "../sink";
import type { BatchSummary, PruneSummary } from "../types";
import type { FetchFn } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  fetchFn?: FetchFn;
}

export interface ResolvePreviewSummary {
  total: number;
  resolved: number;
  unresolved: number;
}

async function loadCandidates(ctx: CommandContext): Promise<string[]> {
  const candidates = await readCandidates(ctx.config.inputPath);
  ctx.metrics.incrementCounter("candidates_read", candidates.length);
  ctx.logger.info("candidates_loaded", { inputPath: ctx.config.inputPath, count: candidates.length });
  return candidates;
}

export async function runDownload(ctx: CommandContext): Promise<BatchSummary> {
  ctx.logger.info("download_start", {
    strategy: ctx.config.strategy,
    outputDir: ctx.config.outputDir,
    maxDownloads: ctx.config.maxDownloads,
  });
  const candidates = await loadCandidates(ctx);
  const summary = await runBatch(candidates, {
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    resolver: createResolver(ctx.config, ctx.fetchFn),
    sink: ctx.sink,
    fetchFn: ctx.fetchFn,
  });
  ctx.logger.info("download_complete", { ...summary });
  return summary;
}

export async function runResolve(ctx: CommandContext): Promise<ResolvePreviewSummary> {
  if (ctx.config.strategy === "redirect") {
    // previewing redirects would need a request per candidate
    ctx.logger.warn("resolve_preview_pattern_only", { strategy: ctx.config.strategy });
  }
  const candidates = await loadCandidates(ctx);
  const summary: ResolvePreviewSummary = { total: candidates.length, resolved: 0, unresolved: 0 };

  for (const candidate of candidates) {
    const url = resolveDocumentUrl(candidate);
    const target = url ? deriveTarget(url, ctx.config.outputDir) : undefined;
    if (!target) {
      summary.unresolved += 1;
      ctx.logger.warn("resolve_item_unresolved", { candidate });
      continue;
    }
    summary.resolved += 1;
    ctx.logger.info("resolve_item", { candidate, url, fileName: target.fileName });
  }

  ctx.logger.info("resolve_complete", { ...summary });
  return summary;
}

export async function runPrune(ctx: CommandContext): Promise<PruneSummary> {
  ctx.logger.info("prune_start", { outputDir: ctx.config.outputDir, maxFileSizeMb: ctx.config.maxFileSizeMb });
  return pruneOversizedFiles(ctx.config.outputDir, megabytesToBytes(ctx.config.maxFileSizeMb), {
    logger: ctx.logger,
    metrics: ctx.metrics,
  });
}

export async function runPipeline(ctx: CommandContext): Promise<void> {
  ctx.logger.info("pipeline_start");
  await runDownload(ctx);
  await runPrune(ctx);
  ctx.logger.info("pipeline_complete");
}
