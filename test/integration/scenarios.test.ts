import { describe, it, expect } from 'vitest';
import { EventBus } from '../../src/core/events.js';
import { ReplayEntropySource } from '../../src/entropy/entropy-source.js';
import { InMemoryLessonStore } from '../../src/memory/in-memory-store.js';
import { createPipeline, RunRegistry, type RunEvent } from '../../src/pipeline/index.js';
import type { RunReport } from '../../src/pipeline/types.js';
import { ConsequenceSimulator } from '../../src/simulation/consequence-simulator.js';
import { createDefaultExecutor } from '../../src/execution/index.js';
import { makeAction, testConfig } from '../helpers/fixtures.js';

const config = testConfig();

function pipelineWith(bits: string, memory = new InMemoryLessonStore(), events?: EventBus) {
  return createPipeline(config, { memory, entropy: new ReplayEntropySource([bits]), events });
}

/** Variant, verdict and risk of every simulated attempt, in order. */
function attempts(report: RunReport): Array<{ variant: number; status: string; risk: number }> {
  const variants = new Map<string, number>();
  const seen: Array<{ variant: number; status: string; risk: number }> = [];
  for (const { result } of report.history) {
    if (result.kind === 'reasoning' && result.output.action) {
      variants.set(result.output.action.id, result.output.action.variant);
    } else if (result.kind === 'world-model' && result.output.verdict) {
      const { verdict } = result.output;
      seen.push({ variant: variants.get(verdict.actionId) ?? -1, status: verdict.status, risk: verdict.riskScore });
    }
  }
  return seen;
}

describe('end-to-end runs', () => {
  it('should refuse to delete everything and learn a lesson from it', async () => {
    const memory = new InMemoryLessonStore();
    const report = await pipelineWith('0000', memory).run('delete all files in /');

    expect(report.mode).toBe('logic');
    expect(report.status).toBe('failure');
    expect(report.reason).toBe('max-retries-exceeded');
    expect(report.retries).toBe(2);
    expect(report.history.some(entry => entry.stage === 'code')).toBe(false);
    expect(report.lesson).toMatchObject({
      actionPattern: 'delete-all',
      actionKind: 'delete',
      cause: 'safety-ceiling: Irreversible action with risk 0.84 at or above the safety ceiling 0.8',
      avoidance: 'NEVER propose irreversible "delete-all" actions on /; narrow the scope or pick a reversible alternative.',
      tags: ['safety-ceiling', 'max-retries-exceeded', 'logic'],
    });

    const recalled = await memory.query('delete all files in /');
    expect(recalled.map(lesson => lesson.id)).toEqual([report.lesson?.id]);
  });

  it('should apply a stored lesson on the next run of the same request', async () => {
    const memory = new InMemoryLessonStore();
    const first = await pipelineWith('0000', memory).run('delete all files in /');
    const second = await pipelineWith('0000', memory).run('delete all files in /');

    expect(second.lessonsRecalled.map(lesson => lesson.id)).toEqual([first.lesson?.id]);
    expect(second.status).toBe('failure');
    expect(second.response).toContain('Risk 0.735 is not below the logic tolerance 0.3');
  });

  it('should answer a harmless request in chaos mode', async () => {
    const events = new EventBus();
    const pipeline = pipelineWith('1111', new InMemoryLessonStore(), events);
    const registry = new RunRegistry(pipeline, events);

    const runId = registry.submit('summarize topic X');
    const seen: RunEvent[] = [];
    for await (const event of registry.stream(runId)) seen.push(event);
    const report = await registry.wait(runId);
    registry.dispose();

    expect(report.mode).toBe('chaos');
    expect(report.status).toBe('success');
    expect(report.lesson).toBeNull();
    expect(report.response).toBe('No sources were available for "summarize topic X". Intent "summarize" maps to respond on user');
    expect(seen.filter(event => event.type === 'stage').length).toBe(6);
    expect(seen[seen.length - 1].type).toBe('complete');
  });

  it('should accept in chaos the same scoped delete that logic rejects', async () => {
    const run = (bits: string) => createPipeline(config, {
      memory: new InMemoryLessonStore(),
      entropy: new ReplayEntropySource([bits]),
      executor: createDefaultExecutor(),
    }).run('delete /tmp/build');

    const chaos = await run('1111');
    const logic = await run('0000');

    // irreversible 0.45 + magnitude 0.35 * m + cost 0.2 * 0.2
    expect(chaos.mode).toBe('chaos');
    expect(chaos.status).toBe('success');
    expect(attempts(chaos)).toEqual([
      { variant: 0, status: 'rejected', risk: 0.7 },
      { variant: 1, status: 'accepted', risk: 0.665 },
    ]);
    expect(logic.mode).toBe('logic');
    expect(logic.reason).toBe('max-retries-exceeded');
    expect(attempts(logic)).toEqual([
      { variant: 0, status: 'rejected', risk: 0.7 },
      { variant: 1, status: 'rejected', risk: 0.665 },
      { variant: 2, status: 'rejected', risk: 0.63 },
    ]);
    expect(logic.history.some(entry => entry.stage === 'code')).toBe(false);
  });

  it('should run accepted code without reaching the host process', async () => {
    const report = await createPipeline(config, {
      entropy: new ReplayEntropySource(['0000']),
      executor: createDefaultExecutor(),
    }).run('calculate this\n```\nlet kind;\ntry { kind = typeof Object.constructor("return process")().pid; } catch (err) { kind = "blocked"; }\nconsole.log(kind)\n```');

    expect(report.mode).toBe('logic');
    expect(report.status).toBe('success');
    expect(report.response).toBe('blocked');
  });

  it('should not learn from a code request it cannot serve offline', async () => {
    const memory = new InMemoryLessonStore();
    const report = await pipelineWith('0000', memory).run('calculate 2 + 2');

    expect(report.reason).toBe('no-alternative-action');
    expect(report.response).toBe(
      'Run failed (no-alternative-action): The request asks for code but contains none, and no model is available to write it',
    );
    expect(report.lesson).toBeNull();
    expect(await memory.list()).toEqual([]);
  });

  it('should let chaos accept a moderate reversible action that logic rejects', () => {
    const simulator = new ConsequenceSimulator(config.simulation);
    const action = makeAction({ magnitude: 1, resourceCost: 0.3, irreversible: false });

    const chaos = simulator.evaluate(action, 'chaos');
    const logic = simulator.evaluate(action, 'logic');

    expect(chaos.status).toBe('accepted');
    expect(logic.status).toBe('rejected');
    expect(logic.rationale).toBe('Risk 0.41 is not below the logic tolerance 0.4');
  });
});
