import { nanoid } from 'nanoid';
import type { Mode, RunState, RunStatus } from '../core/types.js';
import type { EventBus } from '../core/events.js';
import type { Lesson } from '../memory/types.js';
import type { HistoryEntry } from '../stages/types.js';
import type { RunReport } from './types.js';
import type { PipelineOrchestrator } from './orchestrator.js';
import { MindgateError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

export type RunEvent =
  | { type: 'mode'; mode: Mode; score: number; degraded: boolean }
  | { type: 'state'; from: RunState; to: RunState }
  | { type: 'stage'; entry: HistoryEntry }
  | { type: 'retry'; retryCount: number; reason: string }
  | { type: 'lesson'; lesson: Lesson }
  | { type: 'complete'; report: RunReport };

export interface RunPoll {
  runId: string;
  request: string;
  status: 'running' | RunStatus;
  events: RunEvent[];
  report?: RunReport;
}

interface RunRecord {
  runId: string;
  request: string;
  status: 'running' | RunStatus;
  events: RunEvent[];
  report?: RunReport;
  controller: AbortController;
  done: Promise<RunReport>;
  waiters: Array<() => void>;
}

/**
 * Front-end surface over the orchestrator: background submission, polling,
 * streaming of stage events, cancellation.
 */
export class RunRegistry {
  private runs = new Map<string, RunRecord>();
  private logger = getLogger();
  private readonly unsubscribe: () => void;

  constructor(
    private readonly pipeline: PipelineOrchestrator,
    events: EventBus,
    private readonly maxRuns = 100,
  ) {
    const onMode = (e: { runId: string; mode: Mode; score: number; degraded: boolean }): void =>
      this.push(e.runId, { type: 'mode', mode: e.mode, score: e.score, degraded: e.degraded });
    const onState = (e: { runId: string; from: RunState; to: RunState }): void =>
      this.push(e.runId, { type: 'state', from: e.from, to: e.to });
    const onStage = (e: { runId: string; entry: HistoryEntry }): void =>
      this.push(e.runId, { type: 'stage', entry: e.entry });
    const onRetry = (e: { runId: string; retryCount: number; reason: string }): void =>
      this.push(e.runId, { type: 'retry', retryCount: e.retryCount, reason: e.reason });
    const onLesson = (e: { runId: string; lesson: Lesson }): void =>
      this.push(e.runId, { type: 'lesson', lesson: e.lesson });
    const onComplete = (e: { report: RunReport }): void => {
      const record = this.runs.get(e.report.runId);
      if (record) {
        record.report = e.report;
        record.status = e.report.status;
      }
      this.push(e.report.runId, { type: 'complete', report: e.report });
    };

    events.on('run:mode', onMode);
    events.on('state:change', onState);
    events.on('stage:complete', onStage);
    events.on('run:retry', onRetry);
    events.on('lesson:stored', onLesson);
    events.on('run:complete', onComplete);

    this.unsubscribe = () => {
      events.off('run:mode', onMode);
      events.off('state:change', onState);
      events.off('stage:complete', onStage);
      events.off('run:retry', onRetry);
      events.off('lesson:stored', onLesson);
      events.off('run:complete', onComplete);
    };
  }

  submit(request: string): string {
    const runId = nanoid(12);
    const controller = new AbortController();
    const record: RunRecord = {
      runId,
      request,
      status: 'running',
      events: [],
      controller,
      waiters: [],
      done: Promise.resolve().then(() => this.pipeline.run(request, { runId, signal: controller.signal })),
    };
    this.runs.set(runId, record);
    this.evict();

    record.done.then(
      () => this.wake(record),
      (err: unknown) => {
        this.logger.error({ runId, error: toError(err).message }, 'Run rejected unexpectedly');
        record.status = 'failure';
        this.wake(record);
      },
    );
    return runId;
  }

  poll(runId: string): RunPoll | undefined {
    const record = this.runs.get(runId);
    if (!record) return undefined;
    return {
      runId,
      request: record.request,
      status: record.status,
      events: [...record.events],
      report: record.report,
    };
  }

  /**
   * Events of one run, replayed from the start, ending when the run terminates.
   */
  async *stream(runId: string): AsyncGenerator<RunEvent> {
    const record = this.require(runId);
    let index = 0;

    for (;;) {
      while (index < record.events.length) {
        const event = record.events[index++];
        yield event;
        if (event.type === 'complete') return;
      }
      if (record.status !== 'running') return;
      await new Promise<void>(resolve => record.waiters.push(resolve));
    }
  }

  cancel(runId: string): boolean {
    const record = this.runs.get(runId);
    if (!record || record.status !== 'running') return false;
    record.controller.abort();
    return true;
  }

  wait(runId: string): Promise<RunReport> {
    return this.require(runId).done;
  }

  list(): RunPoll[] {
    return [...this.runs.keys()].flatMap(runId => {
      const poll = this.poll(runId);
      return poll ? [poll] : [];
    });
  }

  dispose(): void {
    this.unsubscribe();
    for (const record of this.runs.values()) {
      if (record.status === 'running') record.controller.abort();
    }
  }

  private require(runId: string): RunRecord {
    const record = this.runs.get(runId);
    if (!record) throw new MindgateError(`Unknown run ${runId}`, 'UNKNOWN_RUN');
    return record;
  }

  private push(runId: string, event: RunEvent): void {
    const record = this.runs.get(runId);
    if (!record) return;
    record.events.push(event);
    this.wake(record);
  }

  private wake(record: RunRecord): void {
    for (const resolve of record.waiters.splice(0)) resolve();
  }

  private evict(): void {
    for (const [runId, record] of this.runs) {
      if (this.runs.size <= this.maxRuns) return;
      if (record.status !== 'running') this.runs.delete(runId);
    }
  }
}
