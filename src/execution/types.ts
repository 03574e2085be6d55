import type { ActionKind, ProposedAction } from '../simulation/types.js';

export interface ActionOutcome {
  actionId: string;
  success: boolean;
  output: string;
  error?: string;
  /** True when nothing outside the process was touched. */
  dryRun: boolean;
  durationMs: number;
}

/**
 * Side-effecting collaborator. Only ever called with an action that holds an
 * accepted verdict.
 */
export interface ActionExecutor {
  readonly name: string;
  /** Kinds this executor will run; undefined means any kind. */
  readonly kinds?: readonly ActionKind[];
  execute(action: ProposedAction, signal?: AbortSignal): Promise<ActionOutcome>;
}
