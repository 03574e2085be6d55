import type { Diagnostic } from '../core/types.js';
import type { Lesson, LessonStore } from '../memory/types.js';
import type { ConsequenceSimulator } from '../simulation/consequence-simulator.js';
import type { ExpertStage, RunView, WorldModelResult } from './types.js';
import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';
import { Timer } from '../utils/timer.js';

/**
 * Wraps the consequence simulator. Lessons recalled for the run are merged
 * with a lookup on the action's own pattern before scoring.
 */
export class WorldModelStage implements ExpertStage<'world-model'> {
  readonly kind = 'world-model';
  private logger = getLogger();

  constructor(
    private readonly simulator: ConsequenceSimulator,
    private readonly memory: LessonStore | null = null,
  ) {}

  async run(view: RunView): Promise<WorldModelResult> {
    const timer = new Timer();
    const action = view.currentAction;
    const mode = view.mode;

    if (!action || !mode) {
      return {
        kind: 'world-model',
        status: 'hard-fail',
        reason: 'stage-error',
        diagnostics: [{
          severity: 'hard-fail',
          code: 'simulation-input-missing',
          message: !action ? 'No proposed action to simulate' : 'Run has no mode',
        }],
        durationMs: timer.stop(),
        output: { lessonsConsulted: 0 },
      };
    }

    const diagnostics: Diagnostic[] = [];
    const lessons = await this.lessonsFor(view, action.pattern, diagnostics);
    const verdict = this.simulator.evaluate(action, mode, lessons);

    if (verdict.status === 'rejected') {
      diagnostics.push({
        severity: 'safety-rejection',
        code: verdict.reason,
        message: verdict.rationale,
      });
    }

    return {
      kind: 'world-model',
      status: 'ok',
      diagnostics,
      durationMs: timer.stop(),
      output: { verdict, lessonsConsulted: lessons.length },
    };
  }

  private async lessonsFor(view: RunView, pattern: string, diagnostics: Diagnostic[]): Promise<Lesson[]> {
    const merged = new Map(view.lessons.map(lesson => [lesson.id, lesson]));
    if (!this.memory) return [...merged.values()];

    try {
      for (const lesson of await this.memory.query(pattern)) {
        merged.set(lesson.id, lesson);
      }
    } catch (err) {
      const error = toError(err);
      this.logger.warn({ runId: view.runId, pattern, error: error.message }, 'Lesson lookup failed');
      diagnostics.push({ severity: 'degraded', code: 'memory-unavailable', message: error.message });
    }
    return [...merged.values()];
  }
}
