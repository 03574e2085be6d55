import type { ProposedAction } from '../simulation/types.js';
import type { ActionExecutor, ActionOutcome } from './types.js';
import { DryRunExecutor } from './dry-run-executor.js';
import { SandboxCodeExecutor } from './sandbox-executor.js';

export * from './types.js';
export { DryRunExecutor, type DryRunOptions } from './dry-run-executor.js';
export { SandboxCodeExecutor, checkSyntax, type SandboxOptions } from './sandbox-executor.js';

/**
 * Dispatches each action to the first executor that declares its kind,
 * falling back to an executor without a kind list.
 */
export class RoutingExecutor implements ActionExecutor {
  readonly name = 'router';

  constructor(private readonly executors: readonly ActionExecutor[]) {}

  async execute(action: ProposedAction, signal?: AbortSignal): Promise<ActionOutcome> {
    const executor = this.executors.find(e => e.kinds?.includes(action.kind))
      ?? this.executors.find(e => e.kinds === undefined);
    if (!executor) {
      return {
        actionId: action.id,
        success: false,
        output: '',
        error: `No executor handles "${action.kind}" actions`,
        dryRun: true,
        durationMs: 0,
      };
    }
    return executor.execute(action, signal);
  }
}

export function createDefaultExecutor(timeoutMs?: number): ActionExecutor {
  return new RoutingExecutor([new SandboxCodeExecutor({ timeoutMs }), new DryRunExecutor()]);
}
