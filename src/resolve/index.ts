import type { AppConfig } from "../config";
import type { FetchFn } from "../core/fetch";
import { PatternResolver } from "./patternResolver";
import { RedirectResolver } from "./redirectResolver";
import type { DocumentResolver } from "./types";

export function createResolver(config: AppConfig, fetchFn?: FetchFn): DocumentResolver {
  switch (config.strategy) {
    case "pattern":
      return new PatternResolver();
    case "redirect":
      return new RedirectResolver(config, fetchFn);
    default:
      throw new Error(`Unsupported resolver strategy: ${String(config.strategy)}`);
  }
}

export * from "./patternResolver";
export * from "./redirectResolver";
export * from "./types";
