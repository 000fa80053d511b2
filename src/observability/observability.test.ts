import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger, parseLogLevel } from "./logger";
import { MetricsRegistry } from "./metrics";
import { createRunId } from "./runId";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON line with context and fields", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = new Logger({ component: "cli", runId: "run_a" }).child("download");

    logger.info("batch_item_downloaded", { url: "https://s3.documentcloud.org/documents/1/a.pdf" });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toMatchObject({
      level: "info",
      msg: "batch_item_downloaded",
      component: "cli.download",
      runId: "run_a",
      url: "https://s3.documentcloud.org/documents/1/a.pdf",
    });
  });

  it("sends errors to stderr and drops messages below the minimum level", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new Logger({ component: "cli", runId: "run_a", minLevel: "warn" });

    logger.debug("hidden");
    logger.info("hidden");
    logger.error("shown");

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("parses log levels case-insensitively", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
  });
});

describe("MetricsRegistry", () => {
  it("accumulates counters and reports zero for untouched ones", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("downloads_ok");
    metrics.incrementCounter("downloads_ok", 2);

    expect(metrics.getCounters()).toEqual({
      candidates_read: 0,
      unresolved: 0,
      downloads_ok: 3,
      downloads_failed: 0,
      downloads_skipped: 0,
      files_pruned: 0,
    });
  });

  it("summarizes recorded timers", () => {
    const now = vi.spyOn(Date, "now");
    const metrics = new MetricsRegistry();

    now.mockReturnValueOnce(1_000).mockReturnValueOnce(1_010);
    metrics.startTimer("download_ms")();
    now.mockReturnValueOnce(2_000).mockReturnValueOnce(2_030);
    metrics.startTimer("download_ms")();
    now.mockRestore();

    expect(metrics.getTimerSummaries()).toEqual({
      resolve_ms: { count: 0, min: 0, max: 0, avg: 0 },
      download_ms: { count: 2, min: 10, max: 30, avg: 20 },
    });
  });
});

describe("createRunId", () => {
  it("embeds the timestamp and a random suffix", () => {
    expect(createRunId(new Date("2024-01-02T03:04:05.678Z"), () => 0.5)).toBe("run_2024-01-02T03-04-05-678Z_i00000");
  });
});
