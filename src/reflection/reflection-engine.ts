/**
 * ReflectionEngine — turns a terminated run into a Lesson.
 *
 * Runs on failures, and on successes that needed a retry so the discarded
 * attempt is still remembered. The lesson names the first action that was
 * rejected or failed review, why, and how to avoid it next time. The
 * avoidance rule can be phrased by the model; a template is used otherwise.
 */

import { nanoid } from 'nanoid';
import type { LLMProvider } from '../providers/types.js';
import type { Lesson, LessonStore } from '../memory/types.js';
import type { RunSnapshot } from '../pipeline/types.js';
import type { ProposedAction } from '../simulation/types.js';
import type { HistoryEntry } from '../stages/types.js';
import { completeText } from '../providers/index.js';
import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';

export interface ReflectionEngineOptions {
  store: LessonStore | null;
  llm?: LLMProvider | null;
}

export interface FailedAttempt {
  action: ProposedAction;
  /** Machine-readable cause, e.g. "safety-ceiling" or "critic-fail". */
  code: string;
  detail: string;
}

const RULE_PATTERN = /^(ALWAYS|NEVER)\b.+/;

export class ReflectionEngine {
  private store: LessonStore | null;
  private llm: LLMProvider | null;
  private inFlight = new Map<string, Promise<Lesson | null>>();
  private logger = getLogger();

  constructor(options: ReflectionEngineOptions) {
    this.store = options.store;
    this.llm = options.llm ?? null;
  }

  shouldReflect(run: RunSnapshot): boolean {
    if (run.state === 'terminated-failure') return true;
    return run.state === 'terminated-success' && run.retryCount > 0;
  }

  /**
   * Idempotent per run id. Concurrent calls share one task; a later call is
   * answered from the store, which keeps at most one lesson per run.
   */
  reflect(run: RunSnapshot): Promise<Lesson | null> {
    const pending = this.inFlight.get(run.runId);
    if (pending) return pending;

    const task = this.doReflect(run).finally(() => {
      this.inFlight.delete(run.runId);
    });
    this.inFlight.set(run.runId, task);
    return task;
  }

  private async doReflect(run: RunSnapshot): Promise<Lesson | null> {
    if (!this.shouldReflect(run)) {
      this.logger.debug({ runId: run.runId, state: run.state }, 'ReflectionEngine: nothing to learn');
      return null;
    }

    const attempt = findFailedAttempt(run);
    if (!attempt) {
      this.logger.info({ runId: run.runId, reason: run.reason }, 'ReflectionEngine: run proposed no action');
      return null;
    }

    const lesson: Lesson = Object.freeze({
      id: nanoid(12),
      runId: run.runId,
      summary: summarize(run, attempt),
      actionPattern: attempt.action.pattern,
      actionKind: attempt.action.kind,
      cause: `${attempt.code}: ${attempt.detail}`,
      avoidance: await this.avoidance(run, attempt),
      request: run.request,
      createdAt: Date.now(),
      tags: Object.freeze([...new Set([attempt.code, String(run.reason ?? 'unknown'), run.mode ?? 'no-mode'])]),
    });

    if (!this.store) {
      this.logger.info({ runId: run.runId, pattern: lesson.actionPattern }, 'ReflectionEngine: memory disabled, lesson not persisted');
      return lesson;
    }

    const ack = await this.store.store(lesson);
    if (!ack.stored) {
      const existing = (await this.store.list()).find(stored => stored.runId === run.runId);
      return existing ?? { ...lesson, id: ack.lessonId };
    }

    this.logger.info({ runId: run.runId, lessonId: lesson.id, pattern: lesson.actionPattern }, 'ReflectionEngine: lesson stored');
    return lesson;
  }

  private async avoidance(run: RunSnapshot, attempt: FailedAttempt): Promise<string> {
    const fallback = templateAvoidance(attempt);
    if (!this.llm) return fallback;

    try {
      const reply = await completeText(this.llm, [
        `Request: ${run.request}`,
        `Failed action: ${attempt.action.kind} "${attempt.action.pattern}" on ${attempt.action.target}`,
        `Cause: ${attempt.code}: ${attempt.detail}`,
        'Write one rule, starting with ALWAYS or NEVER, that would have prevented this failure.',
      ].join('\n'), { temperature: 0.2, maxTokens: 128 });

      const rule = reply.split('\n').map(line => line.trim()).find(line => RULE_PATTERN.test(line));
      return rule ?? fallback;
    } catch (err) {
      this.logger.warn({ runId: run.runId, error: toError(err).message }, 'ReflectionEngine: rule phrasing failed, using template');
      return fallback;
    }
  }
}

/**
 * First action that was rejected or failed review; the last proposed action
 * when the run failed some other way.
 */
export function findFailedAttempt(run: RunSnapshot): FailedAttempt | null {
  const actions = new Map<string, ProposedAction>();
  let lastAction: ProposedAction | undefined;

  for (const { result } of run.history) {
    if (result.kind === 'reasoning' && result.output.action) {
      actions.set(result.output.action.id, result.output.action);
      lastAction = result.output.action;
    } else if (result.kind === 'world-model' && result.output.verdict?.status === 'rejected') {
      const action = actions.get(result.output.verdict.actionId);
      if (action) {
        return { action, code: result.output.verdict.reason, detail: result.output.verdict.rationale };
      }
    } else if (result.kind === 'critic' && result.output.verdict === 'fail' && result.output.actionId) {
      const action = actions.get(result.output.actionId);
      if (action) {
        return { action, code: 'critic-fail', detail: result.output.critique };
      }
    }
  }

  if (!lastAction) return null;
  return { action: lastAction, code: String(run.reason ?? 'failure'), detail: lastHardFail(run.history) };
}

function lastHardFail(history: readonly HistoryEntry[]): string {
  for (let i = history.length - 1; i >= 0; i--) {
    const failure = history[i].result.diagnostics.find(d => d.severity === 'hard-fail');
    if (failure) return failure.message;
  }
  return 'run terminated without a result';
}

function summarize(run: RunSnapshot, attempt: FailedAttempt): string {
  const outcome = run.state === 'terminated-success'
    ? `succeeded after ${run.retryCount} retr${run.retryCount === 1 ? 'y' : 'ies'}`
    : `failed (${String(run.reason ?? 'unknown')})`;
  return `Request "${run.request}" ${outcome}; ${attempt.action.kind} "${attempt.action.pattern}" `
    + `on ${attempt.action.target} was stopped by ${attempt.code}`;
}

function templateAvoidance(attempt: FailedAttempt): string {
  const { action } = attempt;
  switch (attempt.code) {
    case 'safety-ceiling':
      return `NEVER propose irreversible "${action.pattern}" actions on ${action.target}; narrow the scope or pick a reversible alternative.`;
    case 'risk-above-tolerance':
      return `NEVER start "${action.pattern}" at magnitude ${action.magnitude}; begin with a narrower, cheaper variant.`;
    case 'malformed-action':
      return `ALWAYS give "${action.pattern}" actions a concrete target and bounded magnitude.`;
    case 'critic-fail':
      return `ALWAYS check the output of "${action.pattern}" before answering.`;
    default:
      return `ALWAYS reconsider "${action.pattern}" actions on ${action.target} before proposing them again (${attempt.code}).`;
  }
}
