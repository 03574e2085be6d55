/**
 * SQLite-backed lesson store.
 * One row per lesson, unique per run; inserts are INSERT OR IGNORE so the
 * table is append-only and safe with several writers on the same file.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { EmbeddingEngine, Lesson, LessonQueryOptions, LessonStore, StoreAck } from './types.js';
import { ACTION_KINDS, type ActionKind } from '../simulation/types.js';
import { LocalEmbeddingEngine } from './embeddings.js';
import { rankLessons } from './relevance.js';
import { MemoryError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

interface LessonRow {
  id: string;
  run_id: string;
  summary: string;
  action_pattern: string;
  action_kind: string;
  cause: string;
  avoidance: string;
  request: string;
  created_at: number;
  tags: string;
}

export interface SqliteLessonStoreOptions {
  engine?: EmbeddingEngine;
  defaultLimit?: number;
  minRelevance?: number;
}

export class SqliteLessonStore implements LessonStore {
  readonly name = 'sqlite';
  private db: Database.Database;
  private readonly engine: EmbeddingEngine;
  private readonly defaultLimit: number;
  private readonly minRelevance: number;
  private logger = getLogger();

  constructor(private readonly dbPath: string, options: SqliteLessonStoreOptions = {}) {
    this.engine = options.engine ?? new LocalEmbeddingEngine();
    this.defaultLimit = options.defaultLimit ?? 3;
    this.minRelevance = options.minRelevance ?? 0.2;

    try {
      if (dbPath !== ':memory:') {
        mkdirSync(dirname(dbPath), { recursive: true });
      }
      this.db = new Database(dbPath);
      if (dbPath !== ':memory:') {
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
      }
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS lessons (
          id TEXT PRIMARY KEY,
          run_id TEXT NOT NULL UNIQUE,
          summary TEXT NOT NULL,
          action_pattern TEXT NOT NULL,
          action_kind TEXT NOT NULL,
          cause TEXT NOT NULL,
          avoidance TEXT NOT NULL,
          request TEXT NOT NULL,
          created_at INTEGER NOT NULL,
          tags TEXT NOT NULL DEFAULT '[]'
        )
      `);
      this.db.exec('CREATE INDEX IF NOT EXISTS idx_lessons_pattern ON lessons(action_pattern)');
    } catch (err) {
      throw new MemoryError(`Failed to open lesson store at ${dbPath}`, toError(err));
    }
  }

  async store(lesson: Lesson): Promise<StoreAck> {
    const insert = this.db.prepare<[string, string, string, string, string, string, string, string, number, string]>(`
      INSERT OR IGNORE INTO lessons
        (id, run_id, summary, action_pattern, action_kind, cause, avoidance, request, created_at, tags)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const result = insert.run(
      lesson.id,
      lesson.runId,
      lesson.summary,
      lesson.actionPattern,
      lesson.actionKind,
      lesson.cause,
      lesson.avoidance,
      lesson.request,
      lesson.createdAt,
      JSON.stringify(lesson.tags),
    );

    if (result.changes > 0) {
      return { stored: true, lessonId: lesson.id };
    }

    const existing = this.db
      .prepare<[string], Pick<LessonRow, 'id'>>('SELECT id FROM lessons WHERE run_id = ?')
      .get(lesson.runId);
    this.logger.debug({ runId: lesson.runId }, 'SqliteLessonStore: lesson for run already stored');
    return { stored: false, lessonId: existing?.id ?? lesson.id };
  }

  async query(pattern: string, options: LessonQueryOptions = {}): Promise<Lesson[]> {
    return rankLessons(await this.list(), pattern, this.engine, {
      limit: options.limit ?? this.defaultLimit,
      minRelevance: options.minRelevance ?? this.minRelevance,
    });
  }

  async list(): Promise<Lesson[]> {
    const rows = this.db
      .prepare<[], LessonRow>('SELECT * FROM lessons ORDER BY created_at ASC, rowid ASC')
      .all();
    return rows.map(rowToLesson);
  }

  getPath(): string {
    return this.dbPath;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function rowToLesson(row: LessonRow): Lesson {
  return Object.freeze({
    id: row.id,
    runId: row.run_id,
    summary: row.summary,
    actionPattern: row.action_pattern,
    actionKind: isActionKind(row.action_kind) ? row.action_kind : 'unknown',
    cause: row.cause,
    avoidance: row.avoidance,
    request: row.request,
    createdAt: row.created_at,
    tags: Object.freeze(parseTags(row.tags)),
  });
}

function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some(kind => kind === value);
}

function parseTags(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((tag): tag is string => typeof tag === 'string') : [];
  } catch {
    return [];
  }
}
