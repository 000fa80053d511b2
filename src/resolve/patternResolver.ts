import type { DocumentResolver, Resolution } from "./types";

export const STORAGE_HOST = "s3.documentcloud.org";

const DOCUMENT_PATTERN = /documentcloud\.org\/documents\/(\d+)-([\w-]+)/;

function parseHost(candidate: string): string | undefined {
  try {
    return new URL(candidate).host;
  } catch {
    return undefined;
  }
}

/**
 * Rewrites a DocumentCloud page URL such as
 * `https://www.documentcloud.org/documents/123-some-slug` into the URL of the
 * stored PDF. URLs already on the storage host are returned untouched.
 *
 * Protocol-relative (`//www.documentcloud.org/...`) and scheme-less
 * (`www.documentcloud.org/...`) candidates are matched on their raw text.
 *
 * Returns an empty string when the candidate is not a recognizable document URL.
 */
export function resolveDocumentUrl(candidate: string): string {
  if (parseHost(candidate)?.includes(STORAGE_HOST)) {
    return candidate;
  }

  const match = DOCUMENT_PATTERN.exec(candidate);
  if (!match) {
    return "";
  }

  const [, docId, slug] = match;
  return `https://${STORAGE_HOST}/documents/${docId}/${slug}.pdf`;
}

export class PatternResolver implements DocumentResolver {
  readonly strategy = "pattern" as const;

  async resolve(candidate: string): Promise<Resolution> {
    const url = resolveDocumentUrl(candidate);
    if (!url) {
      return { kind: "unresolved", failure: "resolution", reason: "unrecognized DocumentCloud URL" };
    }
    return { kind: "url", url };
  }
}
