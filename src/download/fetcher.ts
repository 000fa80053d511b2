import crypto from "node:crypto";
import fs from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Response } from "undici";
import type { AppConfig } from "../config";
import { buildDocumentRequest, defaultFetch, type FetchFn } from "../core/fetch";
import { errorMessage, type Logger, type MetricsRegistry } from "../observability";
import type { DownloadResult, FailureKind } from "../types";
import { deriveTarget, targetExists } from "./target";

const PDF_SIGNATURE = Buffer.from("%PDF-", "latin1");

export interface FetchSource {
  url: string;
  candidate?: string;
  /** Body already requested while resolving; streamed as-is instead of issuing a new GET. */
  response?: Response;
}

export interface FetcherDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
}

type WriteOutcome =
  | { ok: true; bytes: number; sha256: string }
  | { ok: false; failure: FailureKind; error: string };

function failedResult(source: FetchSource, failure: FailureKind, error: string, filePath?: string): DownloadResult {
  return {
    candidate: source.candidate ?? source.url,
    url: source.url,
    status: "download_failed",
    failure,
    filePath,
    error,
    finishedAt: new Date().toISOString(),
  };
}

async function discardBody(response: Response | undefined, logger: Logger): Promise<void> {
  if (!response?.body) {
    return;
  }
  try {
    await response.body.cancel();
  } catch (error) {
    logger.debug("download_body_cancel_failed", { url: response.url, error: errorMessage(error) });
  }
}

async function removeTempFile(tempPath: string, logger: Logger): Promise<void> {
  try {
    await fs.promises.rm(tempPath, { force: true });
  } catch (error) {
    logger.debug("download_temp_cleanup_failed", { tempPath, error: errorMessage(error) });
  }
}

async function writeBody(
  response: Response,
  filePath: string,
  verifyPdfSignature: boolean,
  logger: Logger,
): Promise<WriteOutcome> {
  if (!response.body) {
    return { ok: false, failure: "network", error: "response has no body" };
  }

  const tempPath = `${filePath}.part`;
  const hash = crypto.createHash("sha256");
  let bytes = 0;
  let head = Buffer.alloc(0);
  // whichever side errors first decides the failure kind
  let firstFailure: FailureKind | undefined;

  const writable = fs.createWriteStream(tempPath, { flags: "w" });
  const readable = Readable.fromWeb(response.body);
  readable.on("data", (chunk) => {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    hash.update(buffer);
    bytes += buffer.length;
    if (head.length < PDF_SIGNATURE.length) {
      head = Buffer.concat([head, buffer.subarray(0, PDF_SIGNATURE.length - head.length)]);
    }
  });
  readable.once("error", () => {
    firstFailure ??= "network";
  });
  writable.once("error", () => {
    firstFailure ??= "filesystem";
  });

  let outcome: WriteOutcome;
  try {
    await pipeline(readable, writable);
    if (verifyPdfSignature && !head.equals(PDF_SIGNATURE)) {
      outcome = { ok: false, failure: "verification", error: "response body is not a PDF" };
    } else {
      await fs.promises.rename(tempPath, filePath);
      return { ok: true, bytes, sha256: hash.digest("hex") };
    }
  } catch (error) {
    outcome = { ok: false, failure: firstFailure ?? "filesystem", error: errorMessage(error) };
  }

  await removeTempFile(tempPath, logger);
  return outcome;
}

/**
 * Downloads one resolved document into `outputDir`. Never throws: every failure
 * comes back as a `download_failed` result. The file only appears under its
 * final name once the whole body has been written.
 */
export async function fetchDocument(source: FetchSource, outputDir: string, deps: FetcherDeps): Promise<DownloadResult> {
  const { config, logger, metrics } = deps;
  const fetchFn = deps.fetchFn ?? defaultFetch;
  const candidate = source.candidate ?? source.url;

  const target = deriveTarget(source.url, outputDir);
  if (!target) {
    logger.warn("download_no_file_name", { candidate, url: source.url });
    await discardBody(source.response, logger);
    metrics.incrementCounter("downloads_failed");
    return failedResult(source, "resolution", "cannot derive a file name from URL");
  }

  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
  } catch (error) {
    logger.error("download_output_dir_failed", { outputDir, error: errorMessage(error) });
    await discardBody(source.response, logger);
    metrics.incrementCounter("downloads_failed");
    return failedResult(source, "filesystem", errorMessage(error), target.filePath);
  }

  if (await targetExists(target.filePath)) {
    logger.info("download_skipped_existing", { candidate, url: source.url, filePath: target.filePath });
    await discardBody(source.response, logger);
    metrics.incrementCounter("downloads_skipped");
    return {
      candidate,
      url: source.url,
      status: "skipped",
      filePath: target.filePath,
      finishedAt: new Date().toISOString(),
    };
  }

  const stopTimer = metrics.startTimer("download_ms");
  let response = source.response;
  if (!response) {
    try {
      response = await fetchFn(source.url, buildDocumentRequest(config, config.downloadTimeoutMs));
    } catch (error) {
      const durationMs = stopTimer();
      logger.warn("download_request_failed", { candidate, url: source.url, durationMs, error: errorMessage(error) });
      metrics.incrementCounter("downloads_failed");
      return failedResult(source, "network", errorMessage(error), target.filePath);
    }
  }

  if (!response.ok) {
    const durationMs = stopTimer();
    await discardBody(response, logger);
    logger.warn("download_failed_http", { candidate, url: source.url, durationMs, statusCode: response.status });
    metrics.incrementCounter("downloads_failed");
    return failedResult(source, "network", `HTTP ${response.status}`, target.filePath);
  }

  const written = await writeBody(response, target.filePath, config.verifyPdfSignature, logger);
  const durationMs = stopTimer();
  if (!written.ok) {
    logger.warn("download_write_failed", {
      candidate,
      url: source.url,
      filePath: target.filePath,
      durationMs,
      failure: written.failure,
      error: written.error,
    });
    metrics.incrementCounter("downloads_failed");
    return failedResult(source, written.failure, written.error, target.filePath);
  }

  logger.info("download_item_ok", {
    candidate,
    url: source.url,
    filePath: target.filePath,
    bytes: written.bytes,
    durationMs,
  });
  metrics.incrementCounter("downloads_ok");
  return {
    candidate,
    url: source.url,
    status: "downloaded_ok",
    filePath: target.filePath,
    bytes: written.bytes,
    sha256: written.sha256,
    contentType: response.headers.get("content-type") ?? undefined,
    finishedAt: new Date().toISOString(),
  };
}
