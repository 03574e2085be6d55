import type { Diagnostic } from '../core/types.js';
import type { EntropySource } from '../entropy/types.js';
import type { ModeSelector } from '../entropy/mode-selector.js';
import type { ExpertStage, ModeResult, RunView } from './types.js';
import { Timer } from '../utils/timer.js';

/**
 * Draws entropy once and fixes the run's Mode.
 */
export class ModeStage implements ExpertStage<'mode'> {
  readonly kind = 'mode';

  constructor(
    private readonly entropy: EntropySource,
    private readonly selector: ModeSelector,
  ) {}

  async run(_view: RunView): Promise<ModeResult> {
    const timer = new Timer();
    const draw = this.entropy.draw();
    const mode = this.selector.select(draw.bits);
    const score = this.selector.score(draw.bits);

    const diagnostics: Diagnostic[] = [];
    if (draw.degraded) {
      diagnostics.push({
        severity: 'degraded',
        code: 'entropy-degraded',
        message: `Entropy generator unavailable; bits came from ${draw.source}`,
      });
    }

    return {
      kind: 'mode',
      status: 'ok',
      diagnostics,
      durationMs: timer.stop(),
      output: { mode, score, bitCount: draw.bits.length, degraded: draw.degraded, source: draw.source },
    };
  }
}
