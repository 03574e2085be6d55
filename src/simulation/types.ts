/**
 * Simulation Type Definitions
 * Proposed actions and the verdicts the consequence simulator returns for them.
 */

import type { Mode } from '../core/types.js';

export const ACTION_KINDS = [
  'respond',
  'execute-code',
  'modify-files',
  'delete',
  'commit-change',
  'spend-resource',
  'file-issue',
  'external-request',
] as const;

export type ActionKind = typeof ACTION_KINDS[number];

/**
 * Structured, not-yet-executed description of an effectful operation.
 * Never mutated once proposed.
 */
export interface ProposedAction {
  readonly id: string;
  readonly kind: ActionKind;
  /** Pattern signature shared by similar actions, e.g. "delete-all". Lessons are keyed on it. */
  readonly pattern: string;
  readonly description: string;
  readonly target: string;
  /** Blast radius, 0 (contained) to 1 (everything). */
  readonly magnitude: number;
  /** Resource cost, 0 to 1. */
  readonly resourceCost: number;
  readonly irreversible: boolean;
  /** Index of this alternative among the planner's variants for the same intent. */
  readonly variant: number;
  readonly payload?: {
    readonly code?: string;
    readonly content?: string;
  };
}

export type RejectionReason = 'malformed-action' | 'safety-ceiling' | 'risk-above-tolerance';

export type Outlook = 'stable' | 'uncertain' | 'unstable';

export interface OutcomeForecast {
  successProbability: number;
  outlook: Outlook;
}

interface VerdictBase {
  readonly actionId: string;
  readonly actionPattern: string;
  readonly mode: Mode;
  /** Risk score in [0, 1]. */
  readonly riskScore: number;
  /** Effective acceptance threshold after mode and lesson adjustments. */
  readonly tolerance: number;
  readonly matchedLessonIds: readonly string[];
  readonly forecast: OutcomeForecast;
  readonly rationale: string;
  readonly evaluatedAt: number;
}

export interface AcceptedVerdict extends VerdictBase {
  readonly status: 'accepted';
}

export interface RejectedVerdict extends VerdictBase {
  readonly status: 'rejected';
  readonly reason: RejectionReason;
}

export type SimulationVerdict = AcceptedVerdict | RejectedVerdict;

export function isEffectful(action: ProposedAction): boolean {
  return action.kind !== 'respond';
}

/**
 * Identity of an action for "materially different" comparisons across retries.
 */
export function actionSignature(action: ProposedAction): string {
  return [
    action.kind,
    action.pattern,
    action.target,
    action.magnitude.toFixed(3),
    action.resourceCost.toFixed(3),
    action.irreversible ? 'irreversible' : 'reversible',
    action.variant,
  ].join('|');
}
