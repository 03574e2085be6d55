import type { EmbeddingEngine, Lesson, RankedLesson } from './types.js';
import { cosineSimilarity } from './embeddings.js';

/** Text a lesson is matched on. */
export function lessonText(lesson: Lesson): string {
  return [lesson.actionPattern, lesson.summary, lesson.cause, lesson.request].join(' ');
}

/**
 * Rank lessons against a query. An exact action-pattern match scores 1;
 * anything else scores by embedding similarity. Ties keep newest first.
 */
export async function rankLessons(
  lessons: readonly Lesson[],
  query: string,
  engine: EmbeddingEngine,
  options: { limit: number; minRelevance: number },
): Promise<Lesson[]> {
  if (lessons.length === 0 || options.limit <= 0) return [];

  const normalizedQuery = query.trim().toLowerCase();
  const queryVector = await engine.embed(query);
  const ranked: RankedLesson[] = [];

  for (const lesson of lessons) {
    const relevance = lesson.actionPattern.toLowerCase() === normalizedQuery
      ? 1
      : cosineSimilarity(queryVector, await engine.embed(lessonText(lesson)));

    if (relevance >= options.minRelevance) {
      ranked.push({ lesson, relevance });
    }
  }

  ranked.sort((a, b) => b.relevance - a.relevance || b.lesson.createdAt - a.lesson.createdAt);
  return ranked.slice(0, options.limit).map(entry => entry.lesson);
}
