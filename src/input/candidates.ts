import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../observability";

export function parseCandidates(text: string): string[] {
  const lines = text.split(/\r?\n/).map((line) => line.trim());
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Reads the candidate list, one URL per line. Blank lines are kept so they show
 * up as unresolved items. An unreadable file is fatal for the run.
 */
export async function readCandidates(inputPath: string): Promise<string[]> {
  const absolutePath = path.resolve(inputPath);
  let text: string;
  try {
    text = await fs.promises.readFile(absolutePath, "utf-8");
  } catch (error) {
    throw new Error(`Cannot read candidate list ${absolutePath}: ${errorMessage(error)}`);
  }
  return parseCandidates(text);
}
