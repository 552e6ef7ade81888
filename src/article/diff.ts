import { extname } from "node:path";
import type { DiffSummary } from "../github/types.js";

const FILE_HEADER = /diff --git a\/(.*?) b\//g;
// The trailing class also matches "\n", so an empty added/removed line counts.
const ADDITION = /^\+[^+]/gm;
const DELETION = /^-[^-]/gm;

function countMatches(content: string, pattern: RegExp): number {
  return content.match(pattern)?.length ?? 0;
}

export function parseDiff(diffContent: string): DiffSummary {
  const filesChanged = Array.from(diffContent.matchAll(FILE_HEADER), (match) => match[1]);

  const languages = new Set<string>();
  for (const file of filesChanged) {
    // "out." has an extension of "." and no tag
    const tag = extname(file).slice(1);
    if (tag) {
      languages.add(tag);
    }
  }

  return {
    filesChanged,
    fileCount: filesChanged.length,
    additions: countMatches(diffContent, ADDITION),
    deletions: countMatches(diffContent, DELETION),
    languages: Array.from(languages),
  };
}
