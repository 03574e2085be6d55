import type { EmbeddingEngine, Lesson, LessonQueryOptions, LessonStore, StoreAck } from './types.js';
import { AsyncMutex } from '../core/mutex.js';
import { LocalEmbeddingEngine } from './embeddings.js';
import { rankLessons } from './relevance.js';

export interface InMemoryLessonStoreOptions {
  engine?: EmbeddingEngine;
  defaultLimit?: number;
  minRelevance?: number;
}

/**
 * Process-local lesson store. Appends are serialized; reads take a snapshot
 * and may miss a lesson whose append is still queued.
 */
export class InMemoryLessonStore implements LessonStore {
  readonly name = 'memory';
  private readonly lessons: Lesson[] = [];
  private readonly runIds = new Map<string, string>();
  private readonly writeLock = new AsyncMutex();
  private readonly engine: EmbeddingEngine;
  private readonly defaultLimit: number;
  private readonly minRelevance: number;

  constructor(options: InMemoryLessonStoreOptions = {}) {
    this.engine = options.engine ?? new LocalEmbeddingEngine();
    this.defaultLimit = options.defaultLimit ?? 3;
    this.minRelevance = options.minRelevance ?? 0.2;
  }

  async store(lesson: Lesson): Promise<StoreAck> {
    return this.writeLock.withLock(() => {
      const existing = this.runIds.get(lesson.runId);
      if (existing) {
        return { stored: false, lessonId: existing };
      }
      this.lessons.push(Object.freeze({ ...lesson, tags: Object.freeze([...lesson.tags]) }));
      this.runIds.set(lesson.runId, lesson.id);
      return { stored: true, lessonId: lesson.id };
    });
  }

  async query(pattern: string, options: LessonQueryOptions = {}): Promise<Lesson[]> {
    return rankLessons([...this.lessons], pattern, this.engine, {
      limit: options.limit ?? this.defaultLimit,
      minRelevance: options.minRelevance ?? this.minRelevance,
    });
  }

  async list(): Promise<Lesson[]> {
    return [...this.lessons];
  }

  get size(): number {
    return this.lessons.length;
  }

  async close(): Promise<void> {
    // nothing held
  }
}
