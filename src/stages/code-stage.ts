import type { Diagnostic } from '../core/types.js';
import type { ActionExecutor, ActionOutcome } from '../execution/types.js';
import type { LLMProvider } from '../providers/types.js';
import type { ProposedAction } from '../simulation/types.js';
import type { CodeResult, ExpertStage, RunView } from './types.js';
import { checkSimulationGate } from '../simulation/gate.js';
import { isEffectful } from '../simulation/types.js';
import { completeText } from '../providers/index.js';
import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';
import { Timer } from '../utils/timer.js';

/**
 * Carries out the accepted action. Effectful actions go to the executor;
 * a `respond` action becomes the answer text.
 */
export class CodeStage implements ExpertStage<'code'> {
  readonly kind = 'code';
  private logger = getLogger();

  constructor(
    private readonly executor: ActionExecutor | null,
    private readonly llm: LLMProvider | null = null,
  ) {}

  async run(view: RunView, signal: AbortSignal): Promise<CodeResult> {
    const timer = new Timer();
    const gate = checkSimulationGate(view);
    if (!gate.open) {
      return {
        kind: 'code',
        status: 'hard-fail',
        reason: 'simulation-gate-violation',
        diagnostics: [{ severity: 'hard-fail', code: 'simulation-gate-violation', message: gate.message }],
        durationMs: timer.stop(),
        output: { response: '' },
      };
    }

    const { action } = gate;
    if (!isEffectful(action)) {
      const diagnostics: Diagnostic[] = [];
      const response = await this.compose(view, signal, diagnostics);
      return {
        kind: 'code',
        status: 'ok',
        diagnostics,
        durationMs: timer.stop(),
        output: { actionId: action.id, response },
      };
    }

    if (!this.executor) {
      return {
        kind: 'code',
        status: 'hard-fail',
        reason: 'executor-unavailable',
        diagnostics: [{
          severity: 'hard-fail',
          code: 'executor-unavailable',
          message: `No executor configured for "${action.kind}" actions`,
        }],
        durationMs: timer.stop(),
        output: { actionId: action.id, response: '' },
      };
    }

    const outcome = await this.execute(this.executor, action, signal);
    if (!outcome.success) {
      return {
        kind: 'code',
        status: 'soft-fail',
        diagnostics: [{
          severity: 'soft-fail',
          code: 'execution-failed',
          message: outcome.error ?? `Executor reported failure for ${action.id}`,
        }],
        durationMs: timer.stop(),
        output: { actionId: action.id, outcome, response: outcome.output },
      };
    }

    return {
      kind: 'code',
      status: 'ok',
      diagnostics: [],
      durationMs: timer.stop(),
      output: { actionId: action.id, outcome, response: outcome.output },
    };
  }

  private async execute(executor: ActionExecutor, action: ProposedAction, signal: AbortSignal): Promise<ActionOutcome> {
    try {
      return await executor.execute(action, signal);
    } catch (err) {
      const error = toError(err);
      this.logger.error({ actionId: action.id, error: error.message }, 'Executor threw');
      return { actionId: action.id, success: false, output: '', error: error.message, dryRun: false, durationMs: 0 };
    }
  }

  private async compose(view: RunView, signal: AbortSignal, diagnostics: Diagnostic[]): Promise<string> {
    const rationale = view.latestOf('reasoning')?.output.rationale ?? '';
    const fallback = composeFromFacts(view, rationale);
    if (!this.llm) return fallback;

    const prompt = [
      view.request,
      ...(view.facts.length > 0 ? ['', 'Use these facts:', ...view.facts.map(f => `- ${f.title}: ${f.snippet}`)] : []),
    ].join('\n');

    try {
      const text = await completeText(this.llm, prompt, {
        system: view.modeProfile?.guidance,
        temperature: view.modeProfile?.temperature,
        maxTokens: 1024,
        signal,
      });
      return text || fallback;
    } catch (err) {
      const error = toError(err);
      this.logger.warn({ runId: view.runId, error: error.message }, 'Answer generation failed, using facts');
      diagnostics.push({ severity: 'degraded', code: 'llm-unavailable', message: error.message });
      return fallback;
    }
  }
}

function composeFromFacts(view: RunView, rationale: string): string {
  if (view.facts.length === 0) {
    return `No sources were available for "${view.request}". ${rationale}`.trim();
  }
  return [
    `Findings for "${view.request}":`,
    ...view.facts.map(fact => `- ${fact.title}: ${fact.snippet} (${fact.source})`),
  ].join('\n');
}
