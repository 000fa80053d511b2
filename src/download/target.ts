import fs from "node:fs";
import path from "node:path";

export interface DownloadTarget {
  fileName: string;
  filePath: string;
}

function lastPathSegment(pathname: string): string | undefined {
  const segment = pathname.split("/").filter((part) => part.length > 0).pop();
  if (segment === undefined) {
    return undefined;
  }
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Maps a resolved document URL to the file it is stored under. Both the batch
 * driver and the fetcher go through here so they always agree on the name.
 */
export function deriveTarget(finalUrl: string, outputDir: string): DownloadTarget | undefined {
  let parsed: URL;
  try {
    parsed = new URL(finalUrl);
  } catch {
    return undefined;
  }

  const segment = lastPathSegment(parsed.pathname);
  if (!segment || segment === "." || segment === ".." || /[/\\]/.test(segment)) {
    return undefined;
  }

  const fileName = segment.toLowerCase().endsWith(".pdf") ? segment : `${segment}.pdf`;
  return { fileName, filePath: path.join(outputDir, fileName) };
}

export async function targetExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}
