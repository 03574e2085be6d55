/**
 * Long-term memory type definitions.
 * Lessons are append-only: a correction is a new lesson, never an edit.
 */

import type { ActionKind } from '../simulation/types.js';

export interface Lesson {
  readonly id: string;
  /** Run the lesson was learned from; at most one lesson per run. */
  readonly runId: string;
  readonly summary: string;
  /** Pattern of the action that failed, e.g. "delete-all". */
  readonly actionPattern: string;
  readonly actionKind: ActionKind | 'unknown';
  readonly cause: string;
  readonly avoidance: string;
  readonly request: string;
  readonly createdAt: number;
  readonly tags: readonly string[];
}

export interface StoreAck {
  /** False when a lesson for the same run was already stored. */
  stored: boolean;
  lessonId: string;
}

export interface LessonQueryOptions {
  limit?: number;
  minRelevance?: number;
}

export interface RankedLesson {
  lesson: Lesson;
  relevance: number;
}

export interface LessonStore {
  readonly name: string;
  store(lesson: Lesson): Promise<StoreAck>;
  /** Lessons ranked by relevance to the pattern (an action pattern or free text). */
  query(pattern: string, options?: LessonQueryOptions): Promise<Lesson[]>;
  list(): Promise<Lesson[]>;
  close(): Promise<void>;
}

export interface EmbeddingEngine {
  embed(text: string): Promise<number[]>;
  dimensions(): number;
}
