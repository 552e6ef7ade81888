import { fetch } from "undici";
import { z } from "zod";
import type { RepoConfig } from "../config.js";
import { RemoteError } from "../errors.js";
import type { GitHubSettings, PrCommit, PullRequestMeta } from "./types.js";

const JSON_MEDIA_TYPE = "application/vnd.github.v3+json";
const DIFF_MEDIA_TYPE = "application/vnd.github.v3.diff";
const USER_AGENT = "pr-storyteller";

// GitHub omits or nulls plenty of fields; fall back to "" instead of failing.
const text = () =>
  z
    .string()
    .nullish()
    .transform((value) => value ?? "");

const accountSchema = z
  .object({ login: text() })
  .nullish()
  .transform((account) => account?.login || undefined);

const gitActorSchema = z
  .object({ name: text() })
  .nullish()
  .transform((actor) => actor?.name ?? "");

const pullRequestSchema = z.object({
  number: z.number().int().optional(),
  title: text(),
  body: text(),
  user: accountSchema,
  created_at: text(),
  updated_at: text(),
  html_url: text(),
});

const commitSchema = z.object({
  sha: text(),
  commit: z
    .object({
      message: text(),
      author: gitActorSchema,
      committer: gitActorSchema,
    })
    .nullish(),
  author: accountSchema,
  committer: accountSchema,
});

const commitListSchema = z.array(commitSchema);

function pullUrl(settings: GitHubSettings, repo: RepoConfig, prNumber: number): string {
  return `${settings.apiUrl}/repos/${repo.owner}/${repo.name}/pulls/${prNumber}`;
}

function buildHeaders(settings: GitHubSettings, accept: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: accept,
    "User-Agent": USER_AGENT,
  };
  if (settings.token) {
    headers.Authorization = `Bearer ${settings.token}`;
  }
  return headers;
}

async function githubRequest(
  url: string,
  settings: GitHubSettings,
  accept: string,
): Promise<string> {
  const response = await fetch(url, { headers: buildHeaders(settings, accept) });

  if (!response.ok) {
    const body = await response.text();
    throw new RemoteError(
      `GitHub API error: ${response.status} ${response.statusText}`,
      response.status,
      body,
    );
  }

  return response.text();
}

async function githubJson<S extends z.ZodTypeAny>(
  url: string,
  settings: GitHubSettings,
  schema: S,
): Promise<z.output<S>> {
  const raw = await githubRequest(url, settings, JSON_MEDIA_TYPE);

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new RemoteError(`GitHub API returned invalid JSON for ${url}`, undefined, raw.slice(0, 500));
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new RemoteError(
      `Unexpected GitHub API response for ${url}`,
      undefined,
      parsed.error.message,
    );
  }
  return parsed.data;
}

export async function fetchPullRequest(
  repo: RepoConfig,
  prNumber: number,
  settings: GitHubSettings,
): Promise<PullRequestMeta> {
  const pr = await githubJson(pullUrl(settings, repo, prNumber), settings, pullRequestSchema);

  return {
    number: pr.number ?? prNumber,
    title: pr.title,
    body: pr.body,
    author: pr.user ?? "",
    createdAt: pr.created_at,
    updatedAt: pr.updated_at,
    htmlUrl: pr.html_url,
  };
}

export async function fetchPrCommits(
  repo: RepoConfig,
  prNumber: number,
  settings: GitHubSettings,
): Promise<PrCommit[]> {
  const commits = await githubJson(
    `${pullUrl(settings, repo, prNumber)}/commits`,
    settings,
    commitListSchema,
  );

  return commits.map((commit) => ({
    sha: commit.sha,
    message: commit.commit?.message ?? "",
    authorName: commit.commit?.author ?? "",
    committerName: commit.commit?.committer ?? "",
    authorLogin: commit.author,
    committerLogin: commit.committer,
  }));
}

export async function fetchPrDiff(
  repo: RepoConfig,
  prNumber: number,
  settings: GitHubSettings,
): Promise<string> {
  return githubRequest(pullUrl(settings, repo, prNumber), settings, DIFF_MEDIA_TYPE);
}
