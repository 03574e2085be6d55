/**
 * Local Embedding Engine
 * Hashed term-frequency projection + cosine similarity, computed in process.
 * Used to rank stored lessons against a request or action pattern.
 */

import type { EmbeddingEngine } from './types.js';

export class LocalEmbeddingEngine implements EmbeddingEngine {
  private readonly dims: number;

  constructor(dimensions = 256) {
    this.dims = dimensions;
  }

  dimensions(): number {
    return this.dims;
  }

  async embed(text: string): Promise<number[]> {
    return this.computeEmbedding(tokenize(text));
  }

  /**
   * Compute embedding vector from tokens using hash-based projection
   */
  private computeEmbedding(tokens: string[]): number[] {
    const embedding = new Float64Array(this.dims);
    if (tokens.length === 0) return Array.from(embedding);

    const tf = new Map<string, number>();
    for (const token of tokens) {
      tf.set(token, (tf.get(token) || 0) + 1);
    }

    for (const [term, freq] of tf) {
      const weight = freq / tokens.length;

      for (let seed = 0; seed < 3; seed++) {
        const hash = hashString(term, seed);
        const idx = Math.abs(hash) % this.dims;
        embedding[idx] += weight * (hash > 0 ? 1 : -1);
      }
    }

    return normalize(Array.from(embedding));
  }
}

/**
 * Tokenize text into normalized terms. Hyphenated patterns such as
 * "delete-all" contribute both the whole pattern and its parts.
 */
export function tokenize(text: string): string[] {
  const lowered = text.toLowerCase();
  const tokens: string[] = [];

  for (const raw of lowered.split(/[^\w-]+/)) {
    if (!raw) continue;
    const parts = raw.split('-').filter(Boolean);
    if (parts.length > 1) tokens.push(raw);
    tokens.push(...parts);
  }

  return tokens
    .filter(token => token.length > 1 && token.length < 50)
    .filter(token => !STOP_WORDS.has(token));
}

/**
 * Compute cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;
  return dotProduct / magnitude;
}

function hashString(str: string, seed: number): number {
  let hash = seed;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) - hash + str.charCodeAt(i)) | 0;
  }
  return hash;
}

function normalize(vec: number[]): number[] {
  const magnitude = Math.sqrt(vec.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) return vec;
  return vec.map(val => val / magnitude);
}

const STOP_WORDS = new Set([
  'the', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with',
  'by', 'from', 'is', 'it', 'as', 'be', 'was', 'are', 'this', 'that', 'these',
  'those', 'me', 'my', 'we', 'our', 'you', 'your', 'please', 'can', 'could',
  'would', 'should', 'will', 'do', 'does', 'did', 'so', 'if', 'then', 'than',
]);
