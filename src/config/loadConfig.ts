import fs from "node:fs";
import path from "node:path";
import type { AppConfig, ConfigOverrides, ResolverStrategy } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  inputPath: "extracted_urls.txt",
  outputDir: "NYPD_PDF",
  maxDownloads: 1000,
  strategy: "pattern",
  userAgent: "dc-pdf-fetcher/1.0",
  downloadTimeoutMs: 120_000,
  ignoreHttpsErrors: false,
  verifyPdfSignature: true,
  maxFileSizeMb: 50,
  manifestPath: undefined,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStrategy(value: unknown): value is ResolverStrategy {
  return value === "pattern" || value === "redirect";
}

function pickString(source: Record<string, unknown>, key: string, configPath: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`Config ${configPath}: "${key}" must be a string`);
  }
  return value;
}

function pickNumber(source: Record<string, unknown>, key: string, configPath: string): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Config ${configPath}: "${key}" must be a number`);
  }
  return value;
}

function pickBoolean(source: Record<string, unknown>, key: string, configPath: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new Error(`Config ${configPath}: "${key}" must be a boolean`);
  }
  return value;
}

function parseConfigFile(parsed: unknown, configPath: string): ConfigOverrides {
  if (parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error(`Config ${configPath}: expected a JSON object`);
  }

  const strategy = parsed.strategy;
  if (strategy !== undefined && !isStrategy(strategy)) {
    throw new Error(`Config ${configPath}: "strategy" must be "pattern" or "redirect"`);
  }

  return {
    inputPath: pickString(parsed, "inputPath", configPath),
    outputDir: pickString(parsed, "outputDir", configPath),
    maxDownloads: pickNumber(parsed, "maxDownloads", configPath),
    strategy,
    userAgent: pickString(parsed, "userAgent", configPath),
    downloadTimeoutMs: pickNumber(parsed, "downloadTimeoutMs", configPath),
    ignoreHttpsErrors: pickBoolean(parsed, "ignoreHttpsErrors", configPath),
    verifyPdfSignature: pickBoolean(parsed, "verifyPdfSignature", configPath),
    maxFileSizeMb: pickNumber(parsed, "maxFileSizeMb", configPath),
    manifestPath: pickString(parsed, "manifestPath", configPath),
  };
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return parseConfigFile(parsed, absolutePath);
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string): AppConfig {
  const fileConfig = readConfigFile(configPath);
  const envStrategy = process.env.RESOLVE_STRATEGY;

  return {
    inputPath: process.env.INPUT_PATH ?? fileConfig.inputPath ?? DEFAULT_CONFIG.inputPath,
    outputDir: process.env.OUTPUT_DIR ?? fileConfig.outputDir ?? DEFAULT_CONFIG.outputDir,
    maxDownloads: toInt(process.env.MAX_DOWNLOADS, fileConfig.maxDownloads ?? DEFAULT_CONFIG.maxDownloads),
    strategy: isStrategy(envStrategy) ? envStrategy : fileConfig.strategy ?? DEFAULT_CONFIG.strategy,
    userAgent: process.env.USER_AGENT ?? fileConfig.userAgent ?? DEFAULT_CONFIG.userAgent,
    downloadTimeoutMs: toInt(
      process.env.DOWNLOAD_TIMEOUT_MS,
      fileConfig.downloadTimeoutMs ?? DEFAULT_CONFIG.downloadTimeoutMs,
    ),
    ignoreHttpsErrors: toBool(
      process.env.IGNORE_HTTPS_ERRORS,
      fileConfig.ignoreHttpsErrors ?? DEFAULT_CONFIG.ignoreHttpsErrors,
    ),
    verifyPdfSignature: toBool(
      process.env.VERIFY_PDF_SIGNATURE,
      fileConfig.verifyPdfSignature ?? DEFAULT_CONFIG.verifyPdfSignature,
    ),
    maxFileSizeMb: toInt(process.env.MAX_FILE_SIZE_MB, fileConfig.maxFileSizeMb ?? DEFAULT_CONFIG.maxFileSizeMb),
    manifestPath: process.env.MANIFEST_PATH ?? fileConfig.manifestPath ?? DEFAULT_CONFIG.manifestPath,
  };
}

export { DEFAULT_CONFIG, isStrategy };
