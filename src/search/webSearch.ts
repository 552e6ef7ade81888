export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchClient {
  search(query: string, count: number): Promise<SearchResult[]>;
}

/**
 * No search backend is wired up yet, so enrichment is skipped unless a real
 * client is passed to the job.
 */
export class StubWebSearch implements WebSearchClient {
  async search(_query: string, _count: number): Promise<SearchResult[]> {
    return [];
  }
}
