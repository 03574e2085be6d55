import type { MindgateConfig } from '../core/types.js';
import type { LessonStore } from './types.js';
import { InMemoryLessonStore } from './in-memory-store.js';
import { SqliteLessonStore } from './sqlite-store.js';

export * from './types.js';
export { InMemoryLessonStore } from './in-memory-store.js';
export { SqliteLessonStore } from './sqlite-store.js';
export { LocalEmbeddingEngine, cosineSimilarity, tokenize } from './embeddings.js';
export { rankLessons, lessonText } from './relevance.js';

/**
 * Build the configured lesson store, or null when memory is disabled.
 */
export function createLessonStore(config: MindgateConfig['memory'], defaultPath: string): LessonStore | null {
  if (!config.enabled) return null;

  const options = { defaultLimit: config.maxLessons, minRelevance: config.minRelevance };
  if (config.store === 'memory') {
    return new InMemoryLessonStore(options);
  }
  return new SqliteLessonStore(config.path ?? defaultPath, options);
}
