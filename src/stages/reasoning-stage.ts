import type { Diagnostic } from '../core/types.js';
import type { LLMProvider } from '../providers/types.js';
import type { ProposedAction } from '../simulation/types.js';
import type { ExpertStage, ReasoningResult, RunView } from './types.js';
import { ActionPlanner, extractCode, isIntentName, type Intent } from './action-planner.js';
import type { IntentRouter } from './intent-router.js';
import { checkSyntax } from '../execution/sandbox-executor.js';
import { completeText } from '../providers/index.js';
import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';
import { Timer } from '../utils/timer.js';

/** Model drafts tried per attempt before code generation gives up. */
const MAX_CODE_DRAFTS = 2;

type CodePayload = { code: string } | { problem: string };

/**
 * Proposes the next action for the run. On a retry the proposal must differ
 * from every action already rejected; recalled lessons for the same pattern
 * push the planner further down its ladder of safer variants.
 */
export class ReasoningStage implements ExpertStage<'reasoning'> {
  readonly kind = 'reasoning';
  private logger = getLogger();

  constructor(
    private readonly planner: ActionPlanner,
    private readonly llm: LLMProvider | null = null,
    private readonly router: IntentRouter | null = null,
  ) {}

  async run(view: RunView, signal: AbortSignal): Promise<ReasoningResult> {
    const timer = new Timer();
    const diagnostics: Diagnostic[] = [];
    const intent = await this.intent(view, signal, diagnostics);
    const feedback = view.previousRejectionReasons();

    let payload: ProposedAction['payload'];
    if (intent.kind === 'execute-code') {
      const draft = await this.codePayload(view, feedback, signal, diagnostics);
      if ('problem' in draft) {
        return {
          kind: 'reasoning',
          status: 'hard-fail',
          reason: 'no-alternative-action',
          diagnostics: [
            ...diagnostics,
            { severity: 'hard-fail', code: 'no-alternative-action', message: draft.problem },
          ],
          durationMs: timer.stop(),
          output: { intent: intent.name, difficulty: intent.difficulty, rationale: draft.problem },
        };
      }
      payload = draft;
    }

    const action = this.planner.next(intent, view.rejectedActions(), view.lessons, payload);
    if (!action) {
      return {
        kind: 'reasoning',
        status: 'hard-fail',
        reason: 'no-alternative-action',
        diagnostics: [
          ...diagnostics,
          {
            severity: 'hard-fail',
            code: 'no-alternative-action',
            message: `No untried alternative left for "${intent.pattern}" after ${feedback.length} rejection(s)`,
          },
        ],
        durationMs: timer.stop(),
        output: { intent: intent.name, difficulty: intent.difficulty, rationale: feedback.join('\n') },
      };
    }

    if (feedback.length > 0) {
      diagnostics.push({
        severity: 'info',
        code: 'revised-action',
        message: `Proposing variant ${action.variant} after: ${feedback[feedback.length - 1]}`,
      });
    }

    const rationale = await this.rationale(view, intent, action, feedback, signal, diagnostics);

    return {
      kind: 'reasoning',
      status: 'ok',
      diagnostics,
      durationMs: timer.stop(),
      output: { action, intent: intent.name, difficulty: intent.difficulty, rationale },
    };
  }

  // The intent is chosen once per run; retries reuse the first choice so the
  // ladder of variants stays on one pattern.
  private async intent(view: RunView, signal: AbortSignal, diagnostics: Diagnostic[]): Promise<Intent> {
    const earlier = view.latestOf('reasoning')?.output;
    if (earlier && isIntentName(earlier.intent)) {
      return this.planner.intentFor(earlier.intent, view.request, earlier.difficulty);
    }
    return this.router
      ? this.router.route(view.request, signal, diagnostics)
      : this.planner.classify(view.request);
  }

  private async rationale(
    view: RunView,
    intent: Intent,
    action: ProposedAction,
    feedback: string[],
    signal: AbortSignal,
    diagnostics: Diagnostic[],
  ): Promise<string> {
    const fallback = templateRationale(intent, action, feedback);
    if (!this.llm) return fallback;

    const prompt = [
      `Request: ${view.request}`,
      `Proposed action: ${action.kind} on ${action.target} (magnitude ${action.magnitude}, ${action.irreversible ? 'irreversible' : 'reversible'})`,
      ...(view.facts.length > 0 ? ['Facts:', ...view.facts.map(f => `- ${f.title}: ${f.snippet}`)] : []),
      ...(view.lessons.length > 0 ? ['Past lessons:', ...view.lessons.map(l => `- ${l.avoidance}`)] : []),
      ...(feedback.length > 0 ? ['Earlier attempts were rejected:', ...feedback.map(r => `- ${r}`)] : []),
      'In two sentences, explain why this action answers the request.',
    ].join('\n');

    try {
      const text = await completeText(this.llm, prompt, {
        system: view.modeProfile?.guidance,
        temperature: view.modeProfile?.temperature,
        maxTokens: 256,
        signal,
      });
      return text || fallback;
    } catch (err) {
      const error = toError(err);
      this.logger.warn({ runId: view.runId, error: error.message }, 'Rationale generation failed');
      diagnostics.push({ severity: 'degraded', code: 'llm-unavailable', message: error.message });
      return fallback;
    }
  }

  /**
   * Code for an `execute-code` action: a fenced block in the request, or a
   * model draft that compiles. Compiler errors are fed back into the next
   * draft.
   */
  private async codePayload(
    view: RunView,
    feedback: string[],
    signal: AbortSignal,
    diagnostics: Diagnostic[],
  ): Promise<CodePayload> {
    const llm = this.llm;
    const inline = extractCode(view.request);
    let lastError: string | null = null;
    if (inline) {
      lastError = checkSyntax(inline);
      if (!lastError) return { code: inline };
      diagnostics.push({ severity: 'soft-fail', code: 'invalid-code', message: `Request code does not compile: ${lastError}` });
      if (!llm) return { problem: `The code in the request does not compile (${lastError}) and no model is available to fix it` };
    } else if (!llm) {
      return { problem: 'The request asks for code but contains none, and no model is available to write it' };
    }

    for (let draft = 1; draft <= MAX_CODE_DRAFTS; draft++) {
      const prompt = [
        view.request,
        ...(feedback.length > 0 ? ['Earlier attempts were rejected:', ...feedback.map(r => `- ${r}`)] : []),
        ...(lastError ? [`The previous code did not compile: ${lastError}`] : []),
      ].join('\n');

      let reply: string;
      try {
        reply = await completeText(llm, prompt, {
          system: 'Write plain JavaScript with no imports that prints its result with console.log. Reply with code only.',
          temperature: view.modeProfile?.temperature,
          maxTokens: 1024,
          signal,
        });
      } catch (err) {
        const error = toError(err);
        diagnostics.push({ severity: 'degraded', code: 'llm-unavailable', message: error.message });
        return { problem: `No code could be generated: ${error.message}` };
      }

      const code = extractCode(reply) ?? reply.trim();
      if (!code) {
        lastError = 'the reply was empty';
        continue;
      }
      lastError = checkSyntax(code);
      if (!lastError) return { code };
      diagnostics.push({ severity: 'soft-fail', code: 'invalid-code', message: `Draft ${draft} does not compile: ${lastError}` });
    }

    return { problem: `No draft compiled after ${MAX_CODE_DRAFTS} tries; last error: ${lastError ?? 'unknown'}` };
  }
}

function templateRationale(intent: Intent, action: ProposedAction, feedback: string[]): string {
  const base = `Intent "${intent.name}" maps to ${action.kind} on ${action.target}`
    + (action.variant > 0 ? ` at narrowed scope (variant ${action.variant}, magnitude ${action.magnitude})` : '');
  return feedback.length > 0 ? `${base}; revised after ${feedback.length} rejected attempt(s)` : base;
}
