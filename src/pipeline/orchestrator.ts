/**
 * PipelineOrchestrator — runs one request through the expert stages.
 *
 *   started -> researching -> reasoning -> simulating
 *     -> rejected -> reasoning (retry)
 *     -> accepted -> executing -> critiquing
 *        -> reasoning (retry on critic fail)
 *        -> terminated-success
 *   any hard-fail -> terminated-failure; abort signal -> cancelled
 *
 * The orchestrator is the only writer of the RunContext. Rejections and
 * critic fails share one attempt budget. The simulation gate is checked here
 * before the code stage is called, whatever the stage itself checks.
 * Reflection is awaited on terminated-* before `run` resolves; cancelled runs
 * are not reflected on.
 */

import type { Logger } from '../core/logger.js';
import type { RunState, RunStatus, TerminationReason } from '../core/types.js';
import type { EventBus } from '../core/events.js';
import type { Lesson, LessonStore } from '../memory/types.js';
import type { ReflectionEngine } from '../reflection/reflection-engine.js';
import type {
  ExpertStage,
  StageKind,
  StageResult,
  StageResultBase,
  StageResultOf,
} from '../stages/types.js';
import type { RunOptions, RunReport } from './types.js';
import { RunContext } from '../core/context.js';
import { GateViolationError, RunCancelledError, StageTimeoutError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { checkSimulationGate } from '../simulation/gate.js';
import { settleWithin } from '../utils/retry.js';
import { Timer } from '../utils/timer.js';

export interface StageSet {
  mode: ExpertStage<'mode'>;
  research: ExpertStage<'research'>;
  reasoning: ExpertStage<'reasoning'>;
  worldModel: ExpertStage<'world-model'>;
  code: ExpertStage<'code'>;
  critic: ExpertStage<'critic'>;
}

export interface OrchestratorOptions {
  stages: StageSet;
  /** Total reasoning attempts, the first one included. */
  maxAttempts: number;
  stageTimeoutMs: number;
  /** Lessons recalled for the request at the start of a run. */
  maxLessons?: number;
  memory?: LessonStore | null;
  reflection?: ReflectionEngine | null;
  events?: EventBus;
}

type FailureBuilders = { [K in StageKind]: (base: StageResultBase) => StageResultOf<K> };

const FAILED: FailureBuilders = {
  mode: base => ({ ...base, kind: 'mode', output: { mode: 'logic', score: 0, bitCount: 0, degraded: true, source: 'none' } }),
  research: base => ({ ...base, kind: 'research', output: { facts: [] } }),
  reasoning: base => ({ ...base, kind: 'reasoning', output: { intent: 'unknown', rationale: '' } }),
  'world-model': base => ({ ...base, kind: 'world-model', output: { lessonsConsulted: 0 } }),
  code: base => ({ ...base, kind: 'code', output: { response: '' } }),
  critic: base => ({ ...base, kind: 'critic', output: { verdict: 'fail', critique: 'stage did not complete', checks: [] } }),
};

/**
 * Hard-fail result for an error raised by or around a stage. Gate
 * violations and timeouts keep their own termination reason.
 */
function hardFail(error: Error, timer: Timer): StageResultBase {
  const reason = error instanceof GateViolationError || error instanceof StageTimeoutError ? error.code : 'stage-error';
  return {
    status: 'hard-fail',
    reason,
    durationMs: timer.stop(),
    diagnostics: [{ severity: 'hard-fail', code: reason, message: error.message }],
  };
}

function failedResult<K extends StageKind>(kind: K, base: StageResultBase): StageResultOf<K> {
  const build: FailureBuilders[K] = FAILED[kind];
  return build(base);
}

class Termination {
  constructor(
    readonly status: Exclude<RunStatus, 'cancelled'>,
    readonly reason: TerminationReason,
    readonly response: string,
  ) {}
}

export class PipelineOrchestrator {
  private logger = getLogger();
  private readonly stages: StageSet;
  private readonly memory: LessonStore | null;
  private readonly reflection: ReflectionEngine | null;
  private readonly events?: EventBus;

  constructor(private readonly options: OrchestratorOptions) {
    this.stages = options.stages;
    this.memory = options.memory ?? null;
    this.reflection = options.reflection ?? null;
    this.events = options.events;
  }

  async run(request: string, options: RunOptions = {}): Promise<RunReport> {
    const ctx = new RunContext(request, this.options.maxAttempts, options.runId);
    const signal = options.signal;
    const timer = new Timer();
    const log = this.logger.child({ runId: ctx.runId });

    log.info({ request }, 'Run started');
    this.events?.emit('run:start', { runId: ctx.runId, request });

    let outcome: Termination;
    try {
      outcome = await this.drive(ctx, log, signal);
    } catch (err) {
      if (err instanceof RunCancelledError) {
        return this.cancel(ctx, log, timer);
      }
      const error = toError(err);
      log.error({ error: error.message }, 'Run aborted by an unexpected error');
      ctx.addDiagnostic({ severity: 'hard-fail', code: 'stage-error', message: error.message });
      outcome = new Termination('failure', 'stage-error', `Run failed: ${error.message}`);
    }

    return this.finish(ctx, log, timer, outcome);
  }

  private async drive(ctx: RunContext, log: Logger, signal?: AbortSignal): Promise<Termination> {
    // Mode
    const modeResult = await this.invoke(ctx, this.stages.mode, signal);
    if (modeResult.status === 'hard-fail') return this.failed(modeResult);
    ctx.fixMode(modeResult.output.mode);
    log.info({ mode: modeResult.output.mode, score: modeResult.output.score }, 'Mode fixed');
    this.events?.emit('run:mode', {
      runId: ctx.runId,
      mode: modeResult.output.mode,
      score: modeResult.output.score,
      degraded: modeResult.output.degraded,
    });

    await this.recall(ctx, log, signal);

    // Research
    this.transition(ctx, 'researching');
    const research = await this.invoke(ctx, this.stages.research, signal);
    if (research.status === 'hard-fail') return this.failed(research);
    ctx.addFacts(research.output.facts);

    for (;;) {
      this.transition(ctx, 'reasoning');
      const reasoning = await this.invoke(ctx, this.stages.reasoning, signal);
      if (reasoning.status === 'hard-fail') return this.failed(reasoning);
      const action = reasoning.output.action;
      if (!action) {
        return this.terminateWith(ctx, 'no-alternative-action', 'Reasoning produced no action');
      }
      ctx.setAction(action);

      this.transition(ctx, 'simulating');
      const simulation = await this.invoke(ctx, this.stages.worldModel, signal);
      if (simulation.status === 'hard-fail') return this.failed(simulation);
      const verdict = simulation.output.verdict;
      if (!verdict) {
        return this.terminateWith(ctx, 'simulation-gate-violation', `No verdict produced for action ${action.id}`);
      }

      if (verdict.status === 'rejected') {
        this.transition(ctx, 'rejected');
        log.info({ actionId: action.id, reason: verdict.reason, risk: verdict.riskScore }, 'Action rejected');
        if (!this.retry(ctx, log, `rejected: ${verdict.reason}`)) {
          return this.exhausted(ctx);
        }
        continue;
      }

      this.transition(ctx, 'accepted');
      const gate = checkSimulationGate(ctx);
      if (!gate.open) {
        const violation = new GateViolationError(gate.message, action.id);
        return this.terminateWith(ctx, violation.code, violation.message);
      }

      this.transition(ctx, 'executing');
      const code = await this.invoke(ctx, this.stages.code, signal);
      if (code.status === 'hard-fail') return this.failed(code);

      this.transition(ctx, 'critiquing');
      const critic = await this.invoke(ctx, this.stages.critic, signal);
      if (critic.status === 'hard-fail') return this.failed(critic);

      if (critic.output.verdict === 'fail') {
        log.info({ actionId: action.id, critique: critic.output.critique }, 'Critic failed the attempt');
        if (!this.retry(ctx, log, `critic: ${critic.output.critique}`)) {
          return this.exhausted(ctx);
        }
        continue;
      }

      return new Termination('success', 'completed', code.output.response);
    }
  }

  /**
   * Runs one stage under the per-stage timeout. Timeouts and thrown errors
   * become hard-fail results; an abort of the run signal cancels the run.
   */
  private async invoke<K extends StageKind>(
    ctx: RunContext,
    stage: ExpertStage<K>,
    signal?: AbortSignal,
  ): Promise<StageResultOf<K>> {
    if (signal?.aborted) throw new RunCancelledError(ctx.runId, stage.kind);

    this.events?.emit('stage:start', { runId: ctx.runId, stage: stage.kind, attempt: ctx.retryCount });
    const timer = new Timer();
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let result: StageResultOf<K>;
    try {
      const outcome = await settleWithin(stage.run(ctx, controller.signal), this.options.stageTimeoutMs, signal);
      if (outcome.kind === 'aborted') {
        throw new RunCancelledError(ctx.runId, stage.kind);
      }
      if (outcome.kind === 'value') {
        result = outcome.value;
      } else if (outcome.kind === 'timeout') {
        controller.abort();
        result = failedResult(stage.kind, hardFail(new StageTimeoutError(stage.kind, this.options.stageTimeoutMs), timer));
      } else {
        this.logger.error({ runId: ctx.runId, stage: stage.kind, error: outcome.error.message }, 'Stage threw');
        result = failedResult(stage.kind, hardFail(outcome.error, timer));
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    const entry = ctx.append(result);
    this.events?.emit('stage:complete', { runId: ctx.runId, entry });
    return result;
  }

  private async recall(ctx: RunContext, log: Logger, signal?: AbortSignal): Promise<void> {
    if (!this.memory || (this.options.maxLessons ?? 3) <= 0) return;

    const outcome = await settleWithin(
      this.memory.query(ctx.request, { limit: this.options.maxLessons ?? 3 }),
      this.options.stageTimeoutMs,
      signal,
    );
    switch (outcome.kind) {
      case 'value':
        ctx.addLessons(outcome.value);
        if (outcome.value.length > 0) {
          log.info({ lessons: outcome.value.map(lesson => lesson.actionPattern) }, 'Lessons recalled');
        }
        return;
      case 'aborted':
        throw new RunCancelledError(ctx.runId);
      case 'timeout':
        ctx.addDiagnostic({ severity: 'degraded', code: 'memory-unavailable', message: 'Lesson recall timed out' });
        return;
      case 'error':
        log.warn({ error: outcome.error.message }, 'Lesson recall failed');
        ctx.addDiagnostic({ severity: 'degraded', code: 'memory-unavailable', message: outcome.error.message });
        return;
    }
  }

  private retry(ctx: RunContext, log: Logger, reason: string): boolean {
    if (!ctx.canRetry()) return false;
    const retryCount = ctx.incrementRetry();
    log.info({ retryCount, reason }, 'Retrying with feedback');
    this.events?.emit('run:retry', { runId: ctx.runId, retryCount, reason });
    return true;
  }

  private transition(ctx: RunContext, to: RunState): void {
    const from = ctx.transition(to);
    this.events?.emit('state:change', { runId: ctx.runId, from, to });
  }

  private failed(result: StageResult): Termination {
    const reason = result.reason ?? 'stage-error';
    const detail = result.diagnostics.find(d => d.severity === 'hard-fail')?.message ?? `${result.kind} stage failed`;
    return new Termination('failure', reason, `Run failed (${reason}): ${detail}`);
  }

  private exhausted(ctx: RunContext): Termination {
    const message = `Gave up after ${ctx.attempts} attempt(s); last feedback: `
      + (ctx.previousRejectionReasons().at(-1) ?? 'none');
    ctx.addDiagnostic({ severity: 'hard-fail', code: 'max-retries-exceeded', message });
    return new Termination('failure', 'max-retries-exceeded', `Run failed (max-retries-exceeded): ${message}`);
  }

  private terminateWith(ctx: RunContext, reason: TerminationReason, message: string): Termination {
    ctx.addDiagnostic({ severity: 'hard-fail', code: reason, message });
    return new Termination('failure', reason, `Run failed (${reason}): ${message}`);
  }

  private async finish(ctx: RunContext, log: Logger, timer: Timer, outcome: Termination): Promise<RunReport> {
    this.transition(ctx, outcome.status === 'success' ? 'terminated-success' : 'terminated-failure');
    const snapshot = ctx.snapshot({ status: outcome.status, reason: outcome.reason });

    let lesson: Lesson | null = null;
    if (this.reflection) {
      try {
        lesson = await this.reflection.reflect(snapshot);
        if (lesson) {
          this.events?.emit('lesson:stored', { runId: ctx.runId, lesson });
        }
      } catch (err) {
        const error = toError(err);
        log.error({ error: error.message }, 'Reflection failed');
        ctx.addDiagnostic({ severity: 'degraded', code: 'reflection-failed', message: error.message });
      }
    }

    const report: RunReport = {
      runId: ctx.runId,
      request: ctx.request,
      status: outcome.status,
      reason: outcome.reason,
      mode: ctx.mode,
      response: outcome.response,
      history: snapshot.history,
      retries: ctx.retryCount,
      lessonsRecalled: [...ctx.lessons],
      lesson,
      diagnostics: [...ctx.diagnostics],
      durationMs: timer.stop(),
    };

    log.info({ status: report.status, reason: report.reason, retries: report.retries }, 'Run finished');
    this.events?.emit('run:complete', { report });
    return report;
  }

  private cancel(ctx: RunContext, log: Logger, timer: Timer): RunReport {
    const from = ctx.state;
    this.transition(ctx, 'cancelled');
    ctx.addDiagnostic({ severity: 'info', code: 'cancelled', message: `Cancelled while ${from}` });
    const snapshot = ctx.snapshot({ status: 'cancelled', reason: 'cancelled' });

    const report: RunReport = {
      runId: ctx.runId,
      request: ctx.request,
      status: 'cancelled',
      reason: 'cancelled',
      mode: ctx.mode,
      response: 'Run cancelled',
      history: snapshot.history,
      retries: ctx.retryCount,
      lessonsRecalled: [...ctx.lessons],
      lesson: null,
      diagnostics: snapshot.diagnostics,
      durationMs: timer.stop(),
    };

    log.info('Run cancelled');
    this.events?.emit('run:complete', { report });
    return report;
  }
}
