export interface PullRequestMeta {
  number: number;
  title: string;
  body: string;
  author: string; // login
  createdAt: string; // ISO, "" when unknown
  updatedAt: string;
  htmlUrl: string;
}

export interface PrCommit {
  sha: string;
  message: string; // full message, summaries use the first line
  authorName: string;
  committerName: string;
  authorLogin?: string;
  committerLogin?: string;
}

export interface DiffSummary {
  filesChanged: string[]; // order of first appearance, duplicates kept
  fileCount: number;
  additions: number;
  deletions: number;
  languages: string[]; // extensions without the dot, unique
}

export interface PrInfo {
  repo: string; // "owner/name"
  number: number;
  title: string;
  description: string;
  author: string;
  createdAt: string;
  updatedAt: string;
  htmlUrl: string;
  contributors: string[];
  diffSummary: DiffSummary;
  diffContent: string;
  commits: PrCommit[];
  commitSummary: string;
}

export interface GitHubSettings {
  apiUrl: string;
  token?: string;
}
