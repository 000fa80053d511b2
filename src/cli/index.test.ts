import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { DEFAULT_CONFIG } from "../config";
import { applyCliOverrides, getHelpText, parseCliArgs, runCli } from "./index";

describe("parseCliArgs", () => {
  it("reads the command and its options", () => {
    expect(
      parseCliArgs([
        "download",
        "--input",
        "urls.txt",
        "--output-dir",
        "pdfs",
        "--max-downloads",
        "5",
        "--strategy",
        "redirect",
        "--ignore-https-errors",
      ]),
    ).toEqual({
      command: "download",
      configPath: undefined,
      inputPath: "urls.txt",
      outputDir: "pdfs",
      manifestPath: undefined,
      maxDownloads: 5,
      maxFileSizeMb: undefined,
      strategy: "redirect",
      ignoreHttpsErrors: true,
    });
  });

  it.each([[[]], [["bogus"]], [["download", "--help"]], [["-h"]]])("returns help for %j", (argv) => {
    expect(parseCliArgs(argv)).toBe("help");
  });

  it("drops a numeric option that does not parse", () => {
    const parsed = parseCliArgs(["download", "--max-downloads", "lots"]);
    expect(parsed !== "help" && parsed.maxDownloads).toBeUndefined();
  });

  it("rejects an unknown strategy", () => {
    expect(() => parseCliArgs(["download", "--strategy", "crawl"])).toThrow(
      "Unknown strategy: crawl (expected pattern or redirect)",
    );
  });
});

describe("applyCliOverrides", () => {
  it("overrides only the options that were given", () => {
    const parsed = parseCliArgs(["prune", "--max-file-size-mb", "20"]);
    if (parsed === "help") {
      throw new Error("expected a command");
    }

    expect(applyCliOverrides(DEFAULT_CONFIG, parsed)).toEqual({ ...DEFAULT_CONFIG, maxFileSizeMb: 20 });
  });
});

describe("runCli", () => {
  let tempDir: string;
  let logSpy: MockInstance<typeof console.log>;

  function loggedMessages(): Array<Record<string, unknown>> {
    return logSpy.mock.calls
      .map(([line]) => String(line))
      .filter((line) => line.startsWith("{"))
      .map((line): Record<string, unknown> => JSON.parse(line));
  }

  beforeEach(async () => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "cli-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it("prints help and succeeds", async () => {
    await expect(runCli(["--help"])).resolves.toBe(0);
    expect(logSpy).toHaveBeenCalledWith(getHelpText());
  });

  it("previews resolution without downloading", async () => {
    const inputPath = path.join(tempDir, "urls.txt");
    const outputDir = path.join(tempDir, "pdfs");
    await fs.promises.writeFile(inputPath, "https://www.documentcloud.org/documents/12-report\nnot a url at all\n");

    await expect(runCli(["resolve", "--input", inputPath, "--output-dir", outputDir])).resolves.toBe(0);

    const messages = loggedMessages();
    expect(messages.find((message) => message.msg === "resolve_item")).toMatchObject({
      component: "cli.resolve",
      candidate: "https://www.documentcloud.org/documents/12-report",
      url: "https://s3.documentcloud.org/documents/12/report.pdf",
      fileName: "report.pdf",
    });
    expect(messages.find((message) => message.msg === "resolve_complete")).toMatchObject({
      total: 2,
      resolved: 1,
      unresolved: 1,
    });
    expect(messages.some((message) => message.msg === "metrics_summary")).toBe(true);
    expect(messages.some((message) => message.msg === "resolve_preview_pattern_only")).toBe(false);
    expect(fs.existsSync(outputDir)).toBe(false);
  });

  it("warns that the preview ignores the redirect strategy", async () => {
    const inputPath = path.join(tempDir, "urls.txt");
    await fs.promises.writeFile(inputPath, "https://www.documentcloud.org/documents/12-report\n");

    await expect(runCli(["resolve", "--input", inputPath, "--strategy", "redirect"])).resolves.toBe(0);

    const messages = loggedMessages();
    expect(messages.find((message) => message.msg === "resolve_preview_pattern_only")).toMatchObject({
      level: "warn",
      component: "cli.resolve",
      strategy: "redirect",
    });
    expect(messages.find((message) => message.msg === "resolve_item")).toMatchObject({
      url: "https://s3.documentcloud.org/documents/12/report.pdf",
    });
  });

  it("prunes oversized PDFs from the output directory", async () => {
    const outputDir = path.join(tempDir, "pdfs");
    await fs.promises.mkdir(outputDir);
    await fs.promises.writeFile(path.join(outputDir, "huge.pdf"), "%PDF-");

    await expect(runCli(["prune", "--output-dir", outputDir, "--max-file-size-mb", "0"])).resolves.toBe(0);

    expect(await fs.promises.readdir(outputDir)).toEqual([]);
  });

  it("runs download and prune over an empty list", async () => {
    const inputPath = path.join(tempDir, "urls.txt");
    await fs.promises.writeFile(inputPath, "");

    await expect(runCli(["run", "--input", inputPath, "--output-dir", path.join(tempDir, "pdfs")])).resolves.toBe(0);

    const names = loggedMessages().map((message) => message.msg);
    expect(names).toContain("batch_complete");
    expect(names).toContain("prune_dir_missing");
    expect(names).toContain("pipeline_complete");
  });

  it("fails when the candidate list is missing", async () => {
    await expect(runCli(["download", "--input", path.join(tempDir, "missing.txt")])).rejects.toThrow(
      /^Cannot read candidate list /,
    );
  });
});
