/**
 * Expert stage contracts.
 * Stages read the run through RunView and return a StageResult; only the
 * orchestrator applies results to the run.
 */

import type { Diagnostic, Mode, RunState } from '../core/types.js';
import type { KnowledgeFact } from '../knowledge/types.js';
import type { Lesson } from '../memory/types.js';
import type { ModeProfile } from '../entropy/mode-selector.js';
import type { ActionOutcome } from '../execution/types.js';
import type { AcceptedVerdict, ProposedAction, SimulationVerdict } from '../simulation/types.js';

export const STAGE_KINDS = ['mode', 'research', 'reasoning', 'world-model', 'code', 'critic'] as const;

export type StageKind = typeof STAGE_KINDS[number];

export type StageStatus = 'ok' | 'soft-fail' | 'hard-fail';

export interface StageResultBase {
  status: StageStatus;
  diagnostics: Diagnostic[];
  durationMs: number;
  /** Termination reason carried by a hard-fail. */
  reason?: string;
}

export interface ModeOutput {
  mode: Mode;
  /** Fraction of set bits in the draw. */
  score: number;
  bitCount: number;
  degraded: boolean;
  source: string;
}

export interface ResearchOutput {
  facts: KnowledgeFact[];
}

export interface ReasoningOutput {
  /** Absent on hard-fail. */
  action?: ProposedAction;
  intent: string;
  /** 1 (trivial) to 10 (hard). */
  difficulty?: number;
  rationale: string;
}

export interface WorldModelOutput {
  verdict?: SimulationVerdict;
  lessonsConsulted: number;
}

export interface CodeOutput {
  actionId?: string;
  outcome?: ActionOutcome;
  /** User-facing text produced by this step. */
  response: string;
}

export interface CriticCheck {
  name: string;
  passed: boolean;
  detail: string;
}

export interface CriticOutput {
  actionId?: string;
  verdict: 'pass' | 'fail';
  critique: string;
  checks: CriticCheck[];
}

export type ModeResult = StageResultBase & { kind: 'mode'; output: ModeOutput };
export type ResearchResult = StageResultBase & { kind: 'research'; output: ResearchOutput };
export type ReasoningResult = StageResultBase & { kind: 'reasoning'; output: ReasoningOutput };
export type WorldModelResult = StageResultBase & { kind: 'world-model'; output: WorldModelOutput };
export type CodeResult = StageResultBase & { kind: 'code'; output: CodeOutput };
export type CriticResult = StageResultBase & { kind: 'critic'; output: CriticOutput };

export type StageResult =
  | ModeResult
  | ResearchResult
  | ReasoningResult
  | WorldModelResult
  | CodeResult
  | CriticResult;

export type StageResultOf<K extends StageKind> = Extract<StageResult, { kind: K }>;

export interface HistoryEntry {
  /** Position in the run's history, starting at 1. */
  readonly seq: number;
  readonly stage: StageKind;
  /** Retry counter value when the stage ran. */
  readonly attempt: number;
  readonly state: RunState;
  readonly result: StageResult;
  readonly timestamp: number;
}

/**
 * Read-only view of a run handed to stages.
 */
export interface RunView {
  readonly runId: string;
  readonly request: string;
  readonly mode: Mode | undefined;
  readonly modeProfile: ModeProfile | undefined;
  readonly facts: readonly KnowledgeFact[];
  readonly lessons: readonly Lesson[];
  readonly retryCount: number;
  readonly maxAttempts: number;
  readonly currentAction: ProposedAction | undefined;
  readonly history: readonly HistoryEntry[];

  lastVerdict(): SimulationVerdict | undefined;
  acceptedVerdictFor(actionId: string): AcceptedVerdict | undefined;
  previousRejectionReasons(): string[];
  rejectedActions(): ProposedAction[];
  latestOf<K extends StageKind>(kind: K): StageResultOf<K> | undefined;
}

export interface ExpertStage<K extends StageKind = StageKind> {
  readonly kind: K;
  run(view: RunView, signal: AbortSignal): Promise<StageResultOf<K>>;
}
