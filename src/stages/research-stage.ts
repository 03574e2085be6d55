import type { KnowledgeService } from '../knowledge/types.js';
import type { ExpertStage, ResearchResult, RunView } from './types.js';
import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';
import { Timer } from '../utils/timer.js';

export class ResearchStage implements ExpertStage<'research'> {
  readonly kind = 'research';
  private logger = getLogger();

  constructor(
    private readonly knowledge: KnowledgeService | null,
    private readonly maxFacts: number,
  ) {}

  async run(view: RunView, signal: AbortSignal): Promise<ResearchResult> {
    const timer = new Timer();

    if (!this.knowledge) {
      return {
        kind: 'research',
        status: 'soft-fail',
        diagnostics: [{ severity: 'degraded', code: 'knowledge-unavailable', message: 'No knowledge service configured' }],
        durationMs: timer.stop(),
        output: { facts: [] },
      };
    }

    try {
      const found = await this.knowledge.search(view.request, { limit: this.maxFacts, signal });
      const facts = found.slice(0, this.maxFacts);
      return {
        kind: 'research',
        status: 'ok',
        diagnostics: facts.length === 0
          ? [{ severity: 'info', code: 'no-facts', message: `${this.knowledge.name} returned no results` }]
          : [],
        durationMs: timer.stop(),
        output: { facts },
      };
    } catch (err) {
      const error = toError(err);
      this.logger.warn({ runId: view.runId, error: error.message }, 'Research unavailable, continuing without facts');
      return {
        kind: 'research',
        status: 'soft-fail',
        diagnostics: [{ severity: 'degraded', code: 'knowledge-unavailable', message: error.message }],
        durationMs: timer.stop(),
        output: { facts: [] },
      };
    }
  }
}
