import { nanoid } from 'nanoid';
import type { Diagnostic, Mode, RunState, RunStatus, TerminationReason } from './types.js';
import type { KnowledgeFact } from '../knowledge/types.js';
import type { Lesson } from '../memory/types.js';
import type { HistoryEntry, RunView, StageKind, StageResult, StageResultOf } from '../stages/types.js';
import type { AcceptedVerdict, ProposedAction, SimulationVerdict } from '../simulation/types.js';
import type { RunSnapshot } from '../pipeline/types.js';
import { describeMode, type ModeProfile } from '../entropy/mode-selector.js';
import { MindgateError } from './errors.js';

/**
 * Mutable state of one run. Owned by the orchestrator for the lifetime of
 * the run; stages only ever see it as a RunView.
 */
export class RunContext implements RunView {
  public readonly runId: string;
  public readonly startedAt: number;
  private _mode: Mode | undefined;
  private _state: RunState = 'started';
  private _retryCount = 0;
  private _currentAction: ProposedAction | undefined;
  private readonly _history: HistoryEntry[] = [];
  private readonly _facts: KnowledgeFact[] = [];
  private readonly _lessons: Lesson[] = [];
  private readonly _diagnostics: Diagnostic[] = [];

  constructor(
    public readonly request: string,
    public readonly maxAttempts: number,
    runId?: string,
  ) {
    this.runId = runId ?? nanoid(12);
    this.startedAt = Date.now();
  }

  get mode(): Mode | undefined {
    return this._mode;
  }

  get modeProfile(): ModeProfile | undefined {
    return this._mode ? describeMode(this._mode) : undefined;
  }

  get state(): RunState {
    return this._state;
  }

  get retryCount(): number {
    return this._retryCount;
  }

  /** Attempts made so far, the current one included. */
  get attempts(): number {
    return this._retryCount + 1;
  }

  get currentAction(): ProposedAction | undefined {
    return this._currentAction;
  }

  get history(): readonly HistoryEntry[] {
    return this._history;
  }

  get facts(): readonly KnowledgeFact[] {
    return this._facts;
  }

  get lessons(): readonly Lesson[] {
    return this._lessons;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this._diagnostics;
  }

  get elapsed(): number {
    return Date.now() - this.startedAt;
  }

  // ===== Mutators (orchestrator only) =====

  fixMode(mode: Mode): void {
    if (this._mode !== undefined) {
      throw new MindgateError(`Run ${this.runId} already has mode "${this._mode}"`, 'MODE_ALREADY_SET');
    }
    this._mode = mode;
  }

  append(result: StageResult): HistoryEntry {
    const entry: HistoryEntry = Object.freeze({
      seq: this._history.length + 1,
      stage: result.kind,
      attempt: this._retryCount,
      state: this._state,
      result,
      timestamp: Date.now(),
    });
    this._history.push(entry);
    for (const diagnostic of result.diagnostics) {
      this._diagnostics.push({ ...diagnostic, stage: diagnostic.stage ?? result.kind });
    }
    return entry;
  }

  addFacts(facts: readonly KnowledgeFact[]): void {
    this._facts.push(...facts);
  }

  addLessons(lessons: readonly Lesson[]): void {
    const known = new Set(this._lessons.map(lesson => lesson.id));
    for (const lesson of lessons) {
      if (!known.has(lesson.id)) {
        this._lessons.push(lesson);
        known.add(lesson.id);
      }
    }
  }

  setAction(action: ProposedAction): void {
    this._currentAction = action;
  }

  incrementRetry(): number {
    if (!this.canRetry()) {
      throw new MindgateError(
        `Run ${this.runId} cannot make more than ${this.maxAttempts} attempt(s)`,
        'max-retries-exceeded',
      );
    }
    this._retryCount += 1;
    return this._retryCount;
  }

  canRetry(): boolean {
    return this.attempts < this.maxAttempts;
  }

  transition(to: RunState): RunState {
    const from = this._state;
    this._state = to;
    return from;
  }

  addDiagnostic(diagnostic: Diagnostic): void {
    this._diagnostics.push(diagnostic);
  }

  // ===== RunView queries =====

  lastVerdict(): SimulationVerdict | undefined {
    return this.latestOf('world-model')?.output.verdict;
  }

  acceptedVerdictFor(actionId: string): AcceptedVerdict | undefined {
    for (let i = this._history.length - 1; i >= 0; i--) {
      const result = this._history[i].result;
      if (result.kind === 'world-model' && result.output.verdict?.status === 'accepted'
        && result.output.verdict.actionId === actionId) {
        return result.output.verdict;
      }
    }
    return undefined;
  }

  previousRejectionReasons(): string[] {
    const reasons: string[] = [];
    for (const { result } of this._history) {
      if (result.kind === 'world-model' && result.output.verdict?.status === 'rejected') {
        reasons.push(`${result.output.verdict.reason}: ${result.output.verdict.rationale}`);
      } else if (result.kind === 'critic' && result.output.verdict === 'fail') {
        reasons.push(`critic: ${result.output.critique}`);
      }
    }
    return reasons;
  }

  rejectedActions(): ProposedAction[] {
    const failedIds = new Set<string>();
    for (const { result } of this._history) {
      if (result.kind === 'world-model' && result.output.verdict?.status === 'rejected') {
        failedIds.add(result.output.verdict.actionId);
      } else if (result.kind === 'critic' && result.output.verdict === 'fail' && result.output.actionId) {
        failedIds.add(result.output.actionId);
      }
    }

    const actions: ProposedAction[] = [];
    for (const { result } of this._history) {
      if (result.kind === 'reasoning' && result.output.action && failedIds.has(result.output.action.id)) {
        actions.push(result.output.action);
      }
    }
    return actions;
  }

  latestOf<K extends StageKind>(kind: K): StageResultOf<K> | undefined {
    for (let i = this._history.length - 1; i >= 0; i--) {
      const result = this._history[i].result;
      if (isKind(result, kind)) return result;
    }
    return undefined;
  }

  snapshot(outcome: { status?: RunStatus; reason?: TerminationReason } = {}): RunSnapshot {
    return Object.freeze({
      runId: this.runId,
      request: this.request,
      mode: this._mode,
      state: this._state,
      status: outcome.status,
      reason: outcome.reason,
      history: Object.freeze([...this._history]),
      retryCount: this._retryCount,
      facts: Object.freeze([...this._facts]),
      lessons: Object.freeze([...this._lessons]),
      diagnostics: Object.freeze([...this._diagnostics]),
      startedAt: this.startedAt,
    });
  }
}

function isKind<K extends StageKind>(result: StageResult, kind: K): result is StageResultOf<K> {
  return result.kind === kind;
}
