/**
 * ConsequenceSimulator — estimates whether a proposed action is safe to run.
 *
 * Base risk comes from static action metadata (irreversibility, blast radius,
 * resource cost). The run's Mode sets the tolerance; lessons recorded for the
 * same action pattern lower it. Irreversible actions at or above the safety
 * ceiling are rejected in every mode. Malformed actions are rejected.
 */

import { z } from 'zod';
import type { Mode, SimulationConfig } from '../core/types.js';
import type { Lesson } from '../memory/types.js';
import {
  ACTION_KINDS,
  type OutcomeForecast,
  type ProposedAction,
  type RejectionReason,
  type SimulationVerdict,
} from './types.js';
import { getLogger } from '../core/logger.js';

const ProposedActionSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(ACTION_KINDS),
  pattern: z.string().min(1),
  description: z.string(),
  target: z.string().trim().min(1, 'target is required'),
  magnitude: z.number().finite().min(0).max(1),
  resourceCost: z.number().finite().min(0).max(1),
  irreversible: z.boolean(),
  variant: z.number().int().min(0),
});

export interface RiskBreakdown {
  irreversibility: number;
  blastRadius: number;
  resourceCost: number;
  total: number;
}

export class ConsequenceSimulator {
  private logger = getLogger();

  constructor(private readonly config: SimulationConfig) {}

  evaluate(action: ProposedAction, mode: Mode, lessons: readonly Lesson[] = []): SimulationVerdict {
    const parsed = ProposedActionSchema.safeParse(action);
    if (!parsed.success) {
      const problems = parsed.error.issues
        .map(issue => `${issue.path.join('.') || 'action'}: ${issue.message}`)
        .join('; ');
      this.logger.warn({ problems }, 'ConsequenceSimulator: malformed action rejected');
      return freeze({
        status: 'rejected',
        reason: 'malformed-action',
        actionId: readString(action, 'id') ?? 'unknown',
        actionPattern: readString(action, 'pattern') ?? 'unknown',
        mode,
        riskScore: 1,
        tolerance: 0,
        matchedLessonIds: [],
        forecast: forecast(1),
        rationale: `Malformed action: ${problems}`,
        evaluatedAt: Date.now(),
      });
    }

    const risk = this.scoreRisk(action).total;
    const matched = lessons.filter(lesson => lesson.actionPattern === action.pattern);
    const penalty = Math.min(matched.length * this.config.lessonPenalty, this.config.maxLessonPenalty);
    const tolerance = round(Math.max(0, this.config.tolerance[mode] - penalty));

    const base = {
      actionId: action.id,
      actionPattern: action.pattern,
      mode,
      riskScore: risk,
      tolerance,
      matchedLessonIds: matched.map(lesson => lesson.id),
      forecast: forecast(risk),
      evaluatedAt: Date.now(),
    };

    let rejection: RejectionReason | null = null;
    let rationale: string;

    if (action.irreversible && risk >= this.config.safetyCeiling) {
      rejection = 'safety-ceiling';
      rationale = `Irreversible action with risk ${risk} at or above the safety ceiling ${this.config.safetyCeiling}`;
    } else if (risk >= tolerance) {
      rejection = 'risk-above-tolerance';
      rationale = `Risk ${risk} is not below the ${mode} tolerance ${tolerance}`;
    } else {
      rationale = `Risk ${risk} is below the ${mode} tolerance ${tolerance}`;
    }

    if (matched.length > 0) {
      rationale += ` (tolerance lowered by ${round(penalty)} for ${matched.length} past failure(s) of "${action.pattern}")`;
    }

    this.logger.debug(
      { actionId: action.id, pattern: action.pattern, mode, risk, tolerance, rejection },
      'ConsequenceSimulator: verdict',
    );

    if (rejection) {
      return freeze({ ...base, status: 'rejected', reason: rejection, rationale });
    }
    return freeze({ ...base, status: 'accepted', rationale });
  }

  /**
   * Weighted risk from static metadata. Weights are normalised so the total stays in [0, 1].
   */
  scoreRisk(action: ProposedAction): RiskBreakdown {
    const { weights } = this.config;
    const sum = weights.irreversibility + weights.blastRadius + weights.resourceCost;

    const irreversibility = (weights.irreversibility / sum) * (action.irreversible ? 1 : 0);
    const blastRadius = (weights.blastRadius / sum) * clamp(action.magnitude);
    const resourceCost = (weights.resourceCost / sum) * clamp(action.resourceCost);

    return {
      irreversibility: round(irreversibility),
      blastRadius: round(blastRadius),
      resourceCost: round(resourceCost),
      total: round(clamp(irreversibility + blastRadius + resourceCost)),
    };
  }
}

export function forecast(risk: number): OutcomeForecast {
  const successProbability = round(1 - risk);
  const outlook = successProbability > 0.7 ? 'stable' : successProbability < 0.4 ? 'unstable' : 'uncertain';
  return { successProbability, outlook };
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function readString(value: unknown, key: string): string | undefined {
  if (value === null || typeof value !== 'object') return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' && field.length > 0 ? field : undefined;
}

function freeze(verdict: SimulationVerdict): SimulationVerdict {
  Object.freeze(verdict.matchedLessonIds);
  Object.freeze(verdict.forecast);
  return Object.freeze(verdict);
}
