import type { RunView } from '../stages/types.js';
import type { AcceptedVerdict, ProposedAction } from './types.js';

export type GateCheck =
  | { open: true; action: ProposedAction; verdict: AcceptedVerdict }
  | { open: false; message: string };

/**
 * The simulation gate: the current action may run only when the run's most
 * recent verdict accepted that exact action.
 */
export function checkSimulationGate(view: RunView): GateCheck {
  const action = view.currentAction;
  if (!action) {
    return { open: false, message: 'No proposed action to execute' };
  }

  const last = view.lastVerdict();
  if (!last) {
    return { open: false, message: `No simulation verdict exists for action ${action.id}` };
  }
  if (last.actionId !== action.id) {
    return { open: false, message: `Latest verdict is for action ${last.actionId}, not ${action.id}` };
  }
  if (last.status !== 'accepted') {
    return { open: false, message: `Action ${action.id} was rejected (${last.reason})` };
  }
  return { open: true, action, verdict: last };
}
