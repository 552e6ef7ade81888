import type { PrCommit } from "../github/types.js";

export const NO_COMMITS = "No commits found.";

export function firstLine(message: string): string {
  return message.split("\n")[0];
}

export function summarizeCommits(commits: PrCommit[]): string {
  if (commits.length === 0) return NO_COMMITS;

  let summary = "The changes include:\n\n";
  commits.forEach((commit, i) => {
    summary += `${i + 1}. ${firstLine(commit.message)}\n`;
  });
  return summary;
}

/**
 * Request author first, then every commit author and committer in order.
 * Prefers the GitHub login and falls back to the git name; blanks are skipped.
 */
export function collectContributors(author: string, commits: PrCommit[]): string[] {
  const seen = new Set<string>();
  const add = (identity: string | undefined) => {
    const trimmed = identity?.trim();
    if (trimmed) seen.add(trimmed);
  };

  add(author);
  for (const commit of commits) {
    add(commit.authorLogin || commit.authorName);
    add(commit.committerLogin || commit.committerName);
  }
  return Array.from(seen);
}
