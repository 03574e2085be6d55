import { describe, it, expect } from 'vitest';
import { RunContext } from '../../../src/core/context.js';
import { MindgateError } from '../../../src/core/errors.js';
import type { StageResult } from '../../../src/stages/types.js';
import type { ProposedAction, SimulationVerdict } from '../../../src/simulation/types.js';
import { makeAction, makeLesson } from '../../helpers/fixtures.js';

function reasoning(action: ProposedAction): StageResult {
  return {
    kind: 'reasoning',
    status: 'ok',
    diagnostics: [],
    durationMs: 1,
    output: { action, intent: 'code', rationale: 'because' },
  };
}

function simulated(verdict: SimulationVerdict): StageResult {
  return {
    kind: 'world-model',
    status: 'ok',
    diagnostics: verdict.status === 'rejected'
      ? [{ severity: 'safety-rejection', code: verdict.reason, message: verdict.rationale }]
      : [],
    durationMs: 1,
    output: { verdict, lessonsConsulted: 0 },
  };
}

function verdictFor(action: ProposedAction, status: 'accepted' | 'rejected'): SimulationVerdict {
  const base = {
    actionId: action.id,
    actionPattern: action.pattern,
    mode: 'logic' as const,
    riskScore: 0.5,
    tolerance: 0.4,
    matchedLessonIds: [],
    forecast: { successProbability: 0.5, outlook: 'uncertain' as const },
    rationale: status === 'accepted' ? 'fine' : 'Risk 0.5 is not below the logic tolerance 0.4',
    evaluatedAt: 0,
  };
  return status === 'accepted'
    ? { ...base, status: 'accepted' }
    : { ...base, status: 'rejected', reason: 'risk-above-tolerance' };
}

describe('RunContext', () => {
  it('should start in the started state with no mode', () => {
    const ctx = new RunContext('do something', 2, 'run-1');
    expect(ctx.runId).toBe('run-1');
    expect(ctx.state).toBe('started');
    expect(ctx.mode).toBeUndefined();
    expect(ctx.modeProfile).toBeUndefined();
    expect(ctx.history).toEqual([]);
  });

  it('should generate a run id when none is given', () => {
    expect(new RunContext('x', 1).runId).toHaveLength(12);
  });

  it('should fix the mode exactly once', () => {
    const ctx = new RunContext('x', 2);
    ctx.fixMode('chaos');
    expect(ctx.mode).toBe('chaos');
    expect(ctx.modeProfile?.temperature).toBe(0.9);

    expect(() => ctx.fixMode('logic')).toThrow(MindgateError);
    expect(ctx.mode).toBe('chaos');
  });

  it('should number history entries and record the attempt and state', () => {
    const ctx = new RunContext('x', 2);
    const action = makeAction();
    ctx.transition('reasoning');
    const first = ctx.append(reasoning(action));

    ctx.incrementRetry();
    ctx.transition('simulating');
    const second = ctx.append(simulated(verdictFor(action, 'rejected')));

    expect(first.seq).toBe(1);
    expect(first.attempt).toBe(0);
    expect(first.state).toBe('reasoning');
    expect(second.seq).toBe(2);
    expect(second.attempt).toBe(1);
    expect(second.state).toBe('simulating');
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('should copy stage diagnostics into the run with the stage name', () => {
    const ctx = new RunContext('x', 2);
    ctx.append(simulated(verdictFor(makeAction(), 'rejected')));
    expect(ctx.diagnostics).toEqual([{
      severity: 'safety-rejection',
      code: 'risk-above-tolerance',
      message: 'Risk 0.5 is not below the logic tolerance 0.4',
      stage: 'world-model',
    }]);
  });

  it('should never let the attempts pass the ceiling', () => {
    const ctx = new RunContext('x', 3);
    expect(ctx.attempts).toBe(1);
    expect(ctx.canRetry()).toBe(true);
    expect(ctx.incrementRetry()).toBe(1);
    expect(ctx.incrementRetry()).toBe(2);
    expect(ctx.attempts).toBe(3);
    expect(ctx.canRetry()).toBe(false);
    expect(() => ctx.incrementRetry()).toThrow('cannot make more than 3 attempt(s)');
    expect(ctx.retryCount).toBe(2);
  });

  it('should allow no retry with a ceiling of one attempt', () => {
    const ctx = new RunContext('x', 1);
    expect(ctx.canRetry()).toBe(false);
  });

  it('should return the previous state from transition', () => {
    const ctx = new RunContext('x', 1);
    expect(ctx.transition('researching')).toBe('started');
    expect(ctx.transition('reasoning')).toBe('researching');
  });

  it('should dedupe lessons by id', () => {
    const ctx = new RunContext('x', 1);
    const lesson = makeLesson();
    ctx.addLessons([lesson, lesson]);
    ctx.addLessons([lesson, makeLesson()]);
    expect(ctx.lessons).toHaveLength(2);
  });

  it('should answer verdict queries from history', () => {
    const ctx = new RunContext('x', 2);
    const rejected = makeAction({ variant: 0 });
    const accepted = makeAction({ variant: 1 });

    ctx.append(reasoning(rejected));
    ctx.append(simulated(verdictFor(rejected, 'rejected')));
    ctx.append(reasoning(accepted));
    ctx.append(simulated(verdictFor(accepted, 'accepted')));

    expect(ctx.lastVerdict()?.actionId).toBe(accepted.id);
    expect(ctx.acceptedVerdictFor(accepted.id)?.status).toBe('accepted');
    expect(ctx.acceptedVerdictFor(rejected.id)).toBeUndefined();
    expect(ctx.rejectedActions()).toEqual([rejected]);
    expect(ctx.previousRejectionReasons()).toEqual([
      'risk-above-tolerance: Risk 0.5 is not below the logic tolerance 0.4',
    ]);
    expect(ctx.latestOf('reasoning')?.output.action).toBe(accepted);
    expect(ctx.latestOf('critic')).toBeUndefined();
  });

  it('should count critic failures as rejected actions', () => {
    const ctx = new RunContext('x', 2);
    const action = makeAction();
    ctx.append(reasoning(action));
    ctx.append({
      kind: 'critic',
      status: 'soft-fail',
      diagnostics: [],
      durationMs: 1,
      output: { actionId: action.id, verdict: 'fail', critique: 'output was empty', checks: [] },
    });

    expect(ctx.rejectedActions()).toEqual([action]);
    expect(ctx.previousRejectionReasons()).toEqual(['critic: output was empty']);
  });

  it('should take frozen snapshots that later appends do not change', () => {
    const ctx = new RunContext('x', 2, 'run-snap');
    ctx.fixMode('logic');
    ctx.append(reasoning(makeAction()));
    const snapshot = ctx.snapshot({ status: 'failure', reason: 'stage-error' });
    ctx.append(reasoning(makeAction()));

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.history).toHaveLength(1);
    expect(snapshot.status).toBe('failure');
    expect(snapshot.reason).toBe('stage-error');
    expect(snapshot.mode).toBe('logic');
  });
});
