import type { ProposedAction } from '../simulation/types.js';
import type { ActionExecutor, ActionOutcome } from './types.js';
import { getLogger } from '../core/logger.js';

export interface DryRunOptions {
  /** Most recent actions kept for `history()`. */
  maxRecorded?: number;
}

/**
 * Records actions and reports what would have happened.
 */
export class DryRunExecutor implements ActionExecutor {
  readonly name = 'dry-run';
  private readonly executed: ProposedAction[] = [];
  private readonly maxRecorded: number;
  private logger = getLogger();

  constructor(options: DryRunOptions = {}) {
    this.maxRecorded = options.maxRecorded ?? 100;
  }

  async execute(action: ProposedAction): Promise<ActionOutcome> {
    this.executed.push(action);
    if (this.executed.length > this.maxRecorded) {
      this.executed.splice(0, this.executed.length - this.maxRecorded);
    }
    this.logger.info({ actionId: action.id, kind: action.kind, target: action.target }, 'Dry-run action');

    return {
      actionId: action.id,
      success: true,
      output: `[dry-run] would ${action.kind} on ${action.target}: ${action.description}`,
      dryRun: true,
      durationMs: 0,
    };
  }

  history(): readonly ProposedAction[] {
    return [...this.executed];
  }
}
