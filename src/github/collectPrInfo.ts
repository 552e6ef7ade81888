import type { RepoConfig } from "../config.js";
import { parseDiff } from "../article/diff.js";
import { collectContributors, summarizeCommits } from "../article/commits.js";
import { step } from "../progress.js";
import { fetchPrCommits, fetchPrDiff, fetchPullRequest } from "./client.js";
import type { GitHubSettings, PrInfo } from "./types.js";

export async function collectPrInfo(
  repo: RepoConfig,
  prNumber: number,
  settings: GitHubSettings,
): Promise<PrInfo> {
  const repoKey = `${repo.owner}/${repo.name}`;

  step(`Fetching PR #${prNumber} from ${repoKey}`, "📥");
  const pr = await fetchPullRequest(repo, prNumber, settings);

  step("Fetching commits", "🧾");
  const commits = await fetchPrCommits(repo, prNumber, settings);

  step("Fetching diff", "🔍");
  const diffContent = await fetchPrDiff(repo, prNumber, settings);

  const diffSummary = parseDiff(diffContent);

  return {
    repo: repoKey,
    number: pr.number,
    title: pr.title,
    description: pr.body,
    author: pr.author,
    createdAt: pr.createdAt,
    updatedAt: pr.updatedAt,
    htmlUrl: pr.htmlUrl,
    contributors: collectContributors(pr.author, commits),
    diffSummary,
    diffContent,
    commits,
    commitSummary: summarizeCommits(commits),
  };
}
