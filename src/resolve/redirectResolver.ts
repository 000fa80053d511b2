import type { Response } from "undici";
import type { AppConfig } from "../config";
import { buildDocumentRequest, defaultFetch, type FetchFn } from "../core/fetch";
import { errorMessage } from "../observability";
import type { DocumentResolver, Resolution } from "./types";

function isHttpUrl(candidate: string): boolean {
  try {
    const { protocol } = new URL(candidate);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Resolves a candidate by requesting it and following redirects; the URL of the
 * last hop is the storage location. The response is returned unread so the
 * fetcher can stream it to disk without a second request.
 */
export class RedirectResolver implements DocumentResolver {
  readonly strategy = "redirect" as const;

  constructor(
    private readonly config: AppConfig,
    private readonly fetchFn: FetchFn = defaultFetch,
  ) {}

  async resolve(candidate: string): Promise<Resolution> {
    if (!isHttpUrl(candidate)) {
      return { kind: "unresolved", failure: "resolution", reason: "not an http(s) URL" };
    }

    let response: Response;
    try {
      response = await this.fetchFn(candidate, buildDocumentRequest(this.config, this.config.downloadTimeoutMs));
    } catch (error) {
      return { kind: "unresolved", failure: "network", reason: errorMessage(error) };
    }

    if (!response.ok) {
      await response.body?.cancel();
      return { kind: "unresolved", failure: "network", reason: `HTTP ${response.status}` };
    }

    return { kind: "fetched", url: response.url || candidate, response };
  }
}
