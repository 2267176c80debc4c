export interface SearchResult {
  id: string | null;
  content: string;
  /** Backend relevance score, or the reranker's score once reranked. */
  score: number;
  /** Where the chunk came from (document path or id), when known. */
  sourceReference: string | null;
  metadata: Record<string, unknown>;
}

export interface SearchResponse {
  query: string;
  versionId: string;
  reranked: boolean;
  results: SearchResult[];
}
