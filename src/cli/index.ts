import { isStrategy, loadConfig, type AppConfig, type ResolverStrategy } from "../config";
import { runDownload, runPipeline, runPrune, runResolve } from "../core/commands";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import { createSink } from "../sink";

export type CommandName = "download" | "resolve" | "prune" | "run";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  inputPath?: string;
  outputDir?: string;
  manifestPath?: string;
  maxDownloads?: number;
  maxFileSizeMb?: number;
  strategy?: ResolverStrategy;
  ignoreHttpsErrors: boolean;
}

const HELP_TEXT = `
Usage:
  dc-pdf-fetcher <command> [options]

Commands:
  download   Resolve every listed URL and download the PDFs
  resolve    Print what each listed URL resolves to (pattern strategy), without downloading
  prune      Delete downloaded PDFs larger than --max-file-size-mb
  run        download, then prune

Options:
  --config <path>           Optional path to JSON config file
  --input <path>            File with one DocumentCloud URL per line
  --output-dir <path>       Directory the PDFs are written to
  --max-downloads <n>       Stop after this many new files in one run
  --strategy <name>         pattern (rewrite the URL) or redirect (follow HTTP redirects)
  --manifest <path>         Append one JSON line per item to this file
  --max-file-size-mb <n>    Size limit used by prune
  --ignore-https-errors     Ignore TLS certificate errors (use only when required)
  -h, --help                Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "download" || raw === "resolve" || raw === "prune" || raw === "run") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

function readIntOption(argv: string[], name: string): number | undefined {
  const raw = readOption(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const strategy = readOption(argv, "--strategy");
  if (strategy !== undefined && !isStrategy(strategy)) {
    throw new Error(`Unknown strategy: ${strategy} (expected pattern or redirect)`);
  }

  return {
    command,
    configPath: readOption(argv, "--config"),
    inputPath: readOption(argv, "--input"),
    outputDir: readOption(argv, "--output-dir"),
    manifestPath: readOption(argv, "--manifest"),
    maxDownloads: readIntOption(argv, "--max-downloads"),
    maxFileSizeMb: readIntOption(argv, "--max-file-size-mb"),
    strategy,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    inputPath: parsed.inputPath ?? config.inputPath,
    outputDir: parsed.outputDir ?? config.outputDir,
    manifestPath: parsed.manifestPath ?? config.manifestPath,
    maxDownloads: parsed.maxDownloads ?? config.maxDownloads,
    maxFileSizeMb: parsed.maxFileSizeMb ?? config.maxFileSizeMb,
    strategy: parsed.strategy ?? config.strategy,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: parseLogLevel(process.env.LOG_LEVEL) });
  const context = { runId, config, sink, logger, metrics };

  logger.info("command_start", {
    command: parsed.command,
    strategy: config.strategy,
    inputPath: config.inputPath,
    outputDir: config.outputDir,
    maxDownloads: config.maxDownloads,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "download":
        await runDownload({ ...context, logger: logger.child("download") });
        break;
      case "resolve":
        await runResolve({ ...context, logger: logger.child("resolve") });
        break;
      case "prune":
        await runPrune({ ...context, logger: logger.child("prune") });
        break;
      case "run":
        await runPipeline({ ...context, logger: logger.child("pipeline") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    metrics.printSummary(runId);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
