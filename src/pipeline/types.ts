import type { Diagnostic, Mode, RunState, RunStatus, TerminationReason } from '../core/types.js';
import type { KnowledgeFact } from '../knowledge/types.js';
import type { Lesson } from '../memory/types.js';
import type { HistoryEntry } from '../stages/types.js';

/** Immutable copy of a run, taken at termination. */
export interface RunSnapshot {
  readonly runId: string;
  readonly request: string;
  readonly mode: Mode | undefined;
  readonly state: RunState;
  readonly status?: RunStatus;
  readonly reason?: TerminationReason;
  readonly history: readonly HistoryEntry[];
  readonly retryCount: number;
  readonly facts: readonly KnowledgeFact[];
  readonly lessons: readonly Lesson[];
  readonly diagnostics: readonly Diagnostic[];
  readonly startedAt: number;
}

export interface RunReport {
  runId: string;
  request: string;
  status: RunStatus;
  reason: TerminationReason;
  mode: Mode | undefined;
  /** Final answer on success; a failure summary otherwise. */
  response: string;
  history: readonly HistoryEntry[];
  retries: number;
  lessonsRecalled: readonly Lesson[];
  /** Lesson stored by reflection, if any. */
  lesson: Lesson | null;
  diagnostics: readonly Diagnostic[];
  durationMs: number;
}

export interface RunOptions {
  runId?: string;
  signal?: AbortSignal;
}
