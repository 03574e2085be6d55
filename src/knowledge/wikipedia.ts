import { z } from 'zod';
import type { KnowledgeFact, KnowledgeService } from './types.js';
import { KnowledgeError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

const SearchResponseSchema = z.object({
  query: z.object({
    search: z.array(z.object({
      title: z.string(),
      snippet: z.string().default(''),
    })).default([]),
  }).default({}),
});

export interface WikipediaOptions {
  /** Wiki root, e.g. https://en.wikipedia.org */
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * Knowledge lookup over the MediaWiki full-text search API.
 */
export class WikipediaKnowledgeService implements KnowledgeService {
  readonly name = 'wikipedia';
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;
  private logger = getLogger();

  constructor(options: WikipediaOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://en.wikipedia.org').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async search(query: string, options: { limit?: number; signal?: AbortSignal } = {}): Promise<KnowledgeFact[]> {
    const trimmed = query.trim();
    if (!trimmed) return [];

    const params = new URLSearchParams({
      action: 'query',
      list: 'search',
      srsearch: trimmed,
      srlimit: String(options.limit ?? 5),
      format: 'json',
      utf8: '1',
    });

    const signals = [AbortSignal.timeout(this.timeoutMs)];
    if (options.signal) signals.push(options.signal);

    let body: unknown;
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/w/api.php?${params.toString()}`, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.any(signals),
      });
      if (!response.ok) {
        throw new KnowledgeError(`Wikipedia search failed with status ${response.status}`);
      }
      body = await response.json();
    } catch (err) {
      if (err instanceof KnowledgeError) throw err;
      throw new KnowledgeError('Wikipedia search unavailable', toError(err));
    }

    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new KnowledgeError('Wikipedia returned an unexpected response body');
    }

    const facts = parsed.data.query.search.map(hit => ({
      title: hit.title,
      snippet: stripMarkup(hit.snippet),
      source: `${this.baseUrl}/wiki/${encodeURIComponent(hit.title.replace(/ /g, '_'))}`,
    }));
    this.logger.debug({ query: trimmed, hits: facts.length }, 'Wikipedia search complete');
    return facts;
  }
}

export function stripMarkup(html: string): string {
  return html
    .replace(/<[^>]+>/g, '')
    .replace(/&quot;/g, '"')
    .replace(/&#039;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/\s+/g, ' ')
    .trim();
}
