import type { Diagnostic } from '../core/types.js';
import type { LLMProvider } from '../providers/types.js';
import type { CriticCheck, CriticResult, ExpertStage, RunView } from './types.js';
import { completeText } from '../providers/index.js';
import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';
import { Timer } from '../utils/timer.js';

const FAIL_MARKER = /\[VERDICT\]:\s*FAIL/i;

const REVIEW_SYSTEM_PROMPT =
  'You review an assistant\'s answer. Point out factual or logical problems briefly. '
  + 'End with "[VERDICT]: PASS" or "[VERDICT]: FAIL".';

/**
 * Reviews the executed step. Deterministic checks always run; the optional
 * model review can only turn a pass into a fail.
 */
export class CriticStage implements ExpertStage<'critic'> {
  readonly kind = 'critic';
  private logger = getLogger();

  constructor(private readonly llm: LLMProvider | null = null) {}

  async run(view: RunView, signal: AbortSignal): Promise<CriticResult> {
    const timer = new Timer();
    const diagnostics: Diagnostic[] = [];
    const code = view.latestOf('code');
    const actionId = code?.output.actionId;
    const response = code?.output.response ?? '';

    const checks: CriticCheck[] = [
      {
        name: 'accepted-verdict',
        passed: actionId !== undefined && view.acceptedVerdictFor(actionId) !== undefined,
        detail: actionId ? `verdict for ${actionId}` : 'no executed action',
      },
      {
        name: 'execution-succeeded',
        passed: code !== undefined && (code.output.outcome?.success ?? true),
        detail: code?.output.outcome?.error ?? 'ok',
      },
      {
        name: 'non-empty-output',
        passed: response.trim().length > 0,
        detail: `${response.trim().length} characters`,
      },
    ];

    const failed = checks.filter(check => !check.passed);
    let critique = failed.length === 0
      ? 'All checks passed'
      : `Failed checks: ${failed.map(check => `${check.name} (${check.detail})`).join(', ')}`;
    let verdict: 'pass' | 'fail' = failed.length === 0 ? 'pass' : 'fail';

    if (verdict === 'pass' && this.llm) {
      try {
        const review = await completeText(this.llm, `Request: ${view.request}\n\nAnswer:\n${response}`, {
          system: REVIEW_SYSTEM_PROMPT,
          temperature: 0.1,
          maxTokens: 512,
          signal,
        });
        if (FAIL_MARKER.test(review)) {
          verdict = 'fail';
          critique = review.replace(FAIL_MARKER, '').trim() || 'Model review failed the answer';
        }
      } catch (err) {
        const error = toError(err);
        this.logger.warn({ runId: view.runId, error: error.message }, 'Model review unavailable');
        diagnostics.push({ severity: 'degraded', code: 'llm-unavailable', message: error.message });
      }
    }

    if (verdict === 'fail') {
      diagnostics.push({ severity: 'soft-fail', code: 'critic-fail', message: critique });
    }

    return {
      kind: 'critic',
      status: verdict === 'pass' ? 'ok' : 'soft-fail',
      diagnostics,
      durationMs: timer.stop(),
      output: { actionId, verdict, critique, checks },
    };
  }
}
