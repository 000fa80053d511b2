export type ResolverStrategy = "pattern" | "redirect";

export interface AppConfig {
  inputPath: string;
  outputDir: string;
  maxDownloads: number;
  strategy: ResolverStrategy;
  userAgent: string;
  downloadTimeoutMs: number;
  ignoreHttpsErrors: boolean;
  verifyPdfSignature: boolean;
  maxFileSizeMb: number;
  manifestPath?: string;
}

export type ConfigOverrides = Partial<AppConfig>;
