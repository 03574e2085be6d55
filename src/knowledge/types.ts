export interface KnowledgeFact {
  title: string;
  snippet: string;
  source: string;
}

/** Knowledge-retrieval collaborator. An empty result is not an error. */
export interface KnowledgeService {
  readonly name: string;
  search(query: string, options?: { limit?: number; signal?: AbortSignal }): Promise<KnowledgeFact[]>;
}
