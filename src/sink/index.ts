import type { AppConfig } from "../config";
import { LocalJsonlSink } from "./localJsonlSink";
import { NoopSink } from "./noopSink";
import type { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  if (!config.manifestPath) {
    return new NoopSink();
  }
  return new LocalJsonlSink(config.manifestPath, runId);
}

export { LocalJsonlSink, NoopSink };
export * from "./types";
