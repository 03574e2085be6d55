import { describe, it, expect } from 'vitest';
import { RunContext } from '../../../src/core/context.js';
import { DryRunExecutor } from '../../../src/execution/dry-run-executor.js';
import { SandboxCodeExecutor } from '../../../src/execution/sandbox-executor.js';
import type { ActionExecutor } from '../../../src/execution/types.js';
import { ConsequenceSimulator } from '../../../src/simulation/consequence-simulator.js';
import type { ProposedAction } from '../../../src/simulation/types.js';
import { CodeStage } from '../../../src/stages/code-stage.js';
import { MockProvider } from '../../helpers/mock-provider.js';
import { makeAction, testConfig } from '../../helpers/fixtures.js';

const signal = new AbortController().signal;
const simulator = new ConsequenceSimulator(testConfig().simulation);

/** A run whose current action holds a verdict in logic mode. */
function simulatedRun(request: string, action: ProposedAction, rationale = 'Intent maps to respond'): RunContext {
  const ctx = new RunContext(request, 1);
  ctx.fixMode('logic');
  ctx.append({
    kind: 'reasoning',
    status: 'ok',
    diagnostics: [],
    durationMs: 0,
    output: { action, intent: 'test', rationale },
  });
  ctx.setAction(action);
  ctx.append({
    kind: 'world-model',
    status: 'ok',
    diagnostics: [],
    durationMs: 0,
    output: { verdict: simulator.evaluate(action, 'logic'), lessonsConsulted: 0 },
  });
  return ctx;
}

const respond = (): ProposedAction => makeAction({ kind: 'respond', pattern: 'summarize', target: 'user', magnitude: 0.05, resourceCost: 0.05 });

describe('CodeStage', () => {
  it('should refuse to run a rejected action', async () => {
    const executor = new DryRunExecutor();
    const action = makeAction({ kind: 'delete', irreversible: true, magnitude: 1, resourceCost: 0.2 });
    const ctx = simulatedRun('delete all', action);

    const result = await new CodeStage(executor).run(ctx, signal);

    expect(result.status).toBe('hard-fail');
    expect(result.reason).toBe('simulation-gate-violation');
    expect(result.diagnostics[0].message).toBe(`Action ${action.id} was rejected (safety-ceiling)`);
    expect(executor.history()).toEqual([]);
  });

  it('should refuse an action that was never simulated', async () => {
    const ctx = new RunContext('x', 1);
    ctx.setAction(respond());
    const result = await new CodeStage(null).run(ctx, signal);
    expect(result.reason).toBe('simulation-gate-violation');
  });

  it('should compose an answer from facts without a model', async () => {
    const ctx = simulatedRun('printing press', respond());
    ctx.addFacts([{ title: 'Gutenberg', snippet: 'Built a press around 1440.', source: 'local:1' }]);

    const result = await new CodeStage(null).run(ctx, signal);

    expect(result.status).toBe('ok');
    expect(result.output.response).toBe('Findings for "printing press":\n- Gutenberg: Built a press around 1440. (local:1)');
    expect(result.output.outcome).toBeUndefined();
  });

  it('should say when no sources were available', async () => {
    const ctx = simulatedRun('summarize topic X', respond(), 'Intent "summarize" maps to respond on user');
    const result = await new CodeStage(null).run(ctx, signal);
    expect(result.output.response).toBe('No sources were available for "summarize topic X". Intent "summarize" maps to respond on user');
  });

  it('should answer with the model when one is configured', async () => {
    const llm = new MockProvider(['  The answer.  ']);
    const result = await new CodeStage(null, llm).run(simulatedRun('question', respond()), signal);
    expect(result.output.response).toBe('The answer.');
    expect(llm.calls[0].temperature).toBe(0.2);
  });

  it('should hard-fail an effectful action without an executor', async () => {
    const action = makeAction({ kind: 'execute-code', payload: { code: '1' } });
    const result = await new CodeStage(null).run(simulatedRun('run it', action), signal);
    expect(result.status).toBe('hard-fail');
    expect(result.reason).toBe('executor-unavailable');
  });

  it('should run accepted code in the sandbox', async () => {
    const action = makeAction({ kind: 'execute-code', payload: { code: 'console.log(6 * 7)' } });
    const result = await new CodeStage(new SandboxCodeExecutor()).run(simulatedRun('run it', action), signal);

    expect(result.status).toBe('ok');
    expect(result.output.response).toBe('42');
    expect(result.output.outcome?.success).toBe(true);
  });

  it('should soft-fail when execution fails', async () => {
    const action = makeAction({ kind: 'execute-code', payload: { code: 'throw new Error("boom")' } });
    const result = await new CodeStage(new SandboxCodeExecutor()).run(simulatedRun('run it', action), signal);

    expect(result.status).toBe('soft-fail');
    expect(result.diagnostics).toEqual([{ severity: 'soft-fail', code: 'execution-failed', message: 'boom' }]);
  });

  it('should turn an executor exception into a failed outcome', async () => {
    const throwing: ActionExecutor = {
      name: 'throwing',
      execute: async () => { throw new Error('disk full'); },
    };
    const action = makeAction({ kind: 'modify-files' });
    const result = await new CodeStage(throwing).run(simulatedRun('edit', action), signal);

    expect(result.status).toBe('soft-fail');
    expect(result.output.outcome).toMatchObject({ success: false, error: 'disk full' });
  });
});
