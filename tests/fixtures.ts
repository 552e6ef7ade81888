import type { PrCommit, PrInfo } from "../src/github/types.js";

export function createCommit(overrides: Partial<PrCommit> = {}): PrCommit {
  return {
    sha: "abc1234",
    message: "Initial commit",
    authorName: "",
    committerName: "",
    ...overrides,
  };
}

export function createPrInfo(overrides: Partial<PrInfo> = {}): PrInfo {
  return {
    repo: "acme/widgets",
    number: 42,
    title: "Add caching layer",
    description: "Adds an LRU cache in front of the store.",
    author: "alice",
    createdAt: "2025-11-20T12:00:00Z",
    updatedAt: "2025-11-21T09:30:00Z",
    htmlUrl: "https://github.com/acme/widgets/pull/42",
    contributors: ["alice", "bob"],
    diffSummary: {
      filesChanged: ["src/cache.ts", "src/store.ts"],
      fileCount: 2,
      additions: 12,
      deletions: 3,
      languages: ["ts"],
    },
    diffContent: "",
    commits: [],
    commitSummary: "The changes include:\n\n1. Add cache\n",
    ...overrides,
  };
}
