import type { Response } from "undici";
import type { ResolverStrategy } from "../config";
import type { FailureKind } from "../types";

export type Resolution =
  | { kind: "url"; url: string }
  | { kind: "fetched"; url: string; response: Response }
  | { kind: "unresolved"; failure: FailureKind; reason: string };

export interface DocumentResolver {
  readonly strategy: ResolverStrategy;
  resolve(candidate: string): Promise<Resolution>;
}
