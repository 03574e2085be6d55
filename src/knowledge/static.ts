import type { KnowledgeFact, KnowledgeService } from './types.js';
import { tokenize } from '../memory/embeddings.js';

/**
 * Fixed-corpus knowledge service for offline runs. Facts are ranked by how
 * many query terms appear in their title and snippet.
 */
export class StaticKnowledgeService implements KnowledgeService {
  readonly name = 'static';

  constructor(private readonly corpus: readonly KnowledgeFact[] = []) {}

  async search(query: string, options: { limit?: number } = {}): Promise<KnowledgeFact[]> {
    const terms = new Set(tokenize(query));
    if (terms.size === 0) return [];

    const scored = this.corpus
      .map((fact, index) => {
        const words = new Set(tokenize(`${fact.title} ${fact.snippet}`));
        let hits = 0;
        for (const term of terms) {
          if (words.has(term)) hits++;
        }
        return { fact, hits, index };
      })
      .filter(entry => entry.hits > 0)
      .sort((a, b) => b.hits - a.hits || a.index - b.index);

    return scored.slice(0, options.limit ?? 5).map(entry => ({ ...entry.fact }));
  }
}
