import { Agent, fetch, type RequestInit } from "undici";
import type { AppConfig } from "../config";

export type FetchFn = typeof fetch;

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

/**
 * GET options shared by the redirect resolver and the fetcher. The timeout
 * covers the body as well as the headers, so it must outlive the call to fetch.
 */
export function buildDocumentRequest(config: AppConfig, timeoutMs: number): RequestInit {
  return {
    method: "GET",
    headers: {
      "user-agent": config.userAgent,
      accept: "application/pdf,*/*",
    },
    dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
    signal: AbortSignal.timeout(timeoutMs),
    redirect: "follow",
  };
}

export { fetch as defaultFetch };
