/**
 * ActionPlanner — turns a request into an intent and a ladder of candidate
 * actions. Each rung narrows the blast radius of the one before it; the
 * reasoning stage walks down the ladder as verdicts come back rejected.
 */

import { nanoid } from 'nanoid';
import type { Lesson } from '../memory/types.js';
import { actionSignature, type ActionKind, type ProposedAction } from '../simulation/types.js';

export const INTENT_NAMES = [
  'destructive', 'spend', 'deploy', 'commit', 'issue', 'modify', 'code', 'research', 'summarize', 'respond',
] as const;

export type IntentName = (typeof INTENT_NAMES)[number];

export interface Intent {
  name: IntentName;
  /** 1 (trivial) to 10 (hard). */
  difficulty: number;
  kind: ActionKind;
  pattern: string;
  target: string;
  magnitude: number;
  resourceCost: number;
  irreversible: boolean;
  description: string;
}

interface IntentRule {
  name: Exclude<IntentName, 'respond'>;
  difficulty: number;
  keywords: RegExp;
  build(request: string, target: string | undefined): Omit<Intent, 'name' | 'description' | 'difficulty'>;
}

const SWEEPING = /\b(all|every|everything|entire|whole)\b|(^|\s)(\/|\*)(\s|$)/i;
const PATH = /(?:^|\s)(~\/\S*|\.{1,2}\/\S*|\/\S*)/;
const MAGNITUDE_STEP = 0.1;
const MAGNITUDE_FLOOR = 0.1;

// Order matters: the first matching rule wins.
const RULES: IntentRule[] = [
  {
    name: 'destructive',
    difficulty: 8,
    keywords: /\b(delete|remove|wipe|erase|destroy|drop|format|purge)\b|\brm\s+-rf?\b/i,
    build: (request, target) => SWEEPING.test(request)
      ? { kind: 'delete', pattern: 'delete-all', target: target ?? '/', magnitude: 1, resourceCost: 0.2, irreversible: true }
      : { kind: 'delete', pattern: 'delete-scoped', target: target ?? 'workspace', magnitude: 0.6, resourceCost: 0.2, irreversible: true },
  },
  {
    name: 'spend',
    difficulty: 7,
    keywords: /\b(buy|purchase|pay|spend|transfer|order)\b/i,
    build: (_request, target) => ({
      kind: 'spend-resource', pattern: 'spend-resource', target: target ?? 'account', magnitude: 0.4, resourceCost: 0.8, irreversible: true,
    }),
  },
  {
    name: 'deploy',
    difficulty: 7,
    keywords: /\b(deploy|publish|release|ship)\b/i,
    build: (_request, target) => ({
      kind: 'external-request', pattern: 'deploy', target: target ?? 'production', magnitude: 0.6, resourceCost: 0.3, irreversible: true,
    }),
  },
  {
    name: 'commit',
    difficulty: 4,
    keywords: /\b(commit|push|merge)\b/i,
    build: (_request, target) => ({
      kind: 'commit-change', pattern: 'commit-change', target: target ?? 'repository', magnitude: 0.3, resourceCost: 0.1, irreversible: false,
    }),
  },
  {
    name: 'issue',
    difficulty: 3,
    keywords: /\b(issue|ticket|bug report)\b/i,
    build: (_request, target) => ({
      kind: 'file-issue', pattern: 'file-issue', target: target ?? 'tracker', magnitude: 0.2, resourceCost: 0.1, irreversible: false,
    }),
  },
  {
    name: 'modify',
    difficulty: 5,
    keywords: /\b(write|edit|modify|rename|create)\b.*\b(file|files|directory|folder)\b/i,
    build: (_request, target) => ({
      kind: 'modify-files', pattern: 'modify-files', target: target ?? 'workspace', magnitude: 0.4, resourceCost: 0.1, irreversible: false,
    }),
  },
  {
    name: 'code',
    difficulty: 5,
    keywords: /\b(code|script|function|implement|program|python|typescript|javascript|compute|calculate)\b/i,
    build: () => ({
      kind: 'execute-code', pattern: 'execute-code', target: 'sandbox', magnitude: 0.3, resourceCost: 0.3, irreversible: false,
    }),
  },
  {
    name: 'research',
    difficulty: 3,
    keywords: /\b(research|find|search|look up|who|when|where)\b/i,
    build: () => ({
      kind: 'respond', pattern: 'research', target: 'user', magnitude: 0.05, resourceCost: 0.05, irreversible: false,
    }),
  },
  {
    name: 'summarize',
    difficulty: 2,
    keywords: /\b(summari[sz]e|summary|explain|describe|overview)\b/i,
    build: () => ({
      kind: 'respond', pattern: 'summarize', target: 'user', magnitude: 0.05, resourceCost: 0.05, irreversible: false,
    }),
  },
];

export class ActionPlanner {
  constructor(private readonly maxVariants: number = 5) {}

  /** Keyword classification; the first matching rule wins. */
  classify(request: string): Intent {
    const rule = RULES.find(r => r.keywords.test(request));
    return this.intentFor(rule?.name ?? 'respond', request);
  }

  /**
   * Intent for a name chosen elsewhere, e.g. by a model. Metadata always
   * comes from the rule table; only the difficulty may be overridden.
   */
  intentFor(name: IntentName, request: string, difficulty?: number): Intent {
    const target = extractPath(request);
    const rule = RULES.find(r => r.name === name);
    const base = rule
      ? rule.build(request, target)
      : { kind: 'respond' as const, pattern: 'respond', target: 'user', magnitude: 0.05, resourceCost: 0.05, irreversible: false };

    return {
      name,
      difficulty: difficulty ?? rule?.difficulty ?? 3,
      description: request.trim(),
      ...base,
    };
  }

  /** The candidate for one rung of the ladder. */
  variant(intent: Intent, index: number, payload?: ProposedAction['payload']): ProposedAction {
    const narrowed = Math.max(Math.min(intent.magnitude, MAGNITUDE_FLOOR), intent.magnitude - MAGNITUDE_STEP * index);
    return Object.freeze({
      id: nanoid(10),
      kind: intent.kind,
      pattern: intent.pattern,
      description: index === 0 ? intent.description : `${intent.description} (narrowed scope, variant ${index})`,
      target: intent.target,
      magnitude: Math.round(narrowed * 1000) / 1000,
      resourceCost: intent.resourceCost,
      irreversible: intent.irreversible,
      variant: index,
      ...(payload ? { payload: Object.freeze({ ...payload }) } : {}),
    });
  }

  /**
   * Next candidate that differs from every rejected action. Lessons recorded
   * for the same pattern skip the rungs that already failed before.
   * Returns null once the ladder is exhausted.
   */
  next(
    intent: Intent,
    rejected: readonly ProposedAction[],
    lessons: readonly Lesson[],
    payload?: ProposedAction['payload'],
  ): ProposedAction | null {
    const rejectedSignatures = new Set(rejected.map(actionSignature));
    const usedVariants = new Set(rejected.filter(a => a.pattern === intent.pattern).map(a => a.variant));
    const start = Math.min(
      lessons.filter(lesson => lesson.actionPattern === intent.pattern).length,
      this.maxVariants - 1,
    );

    for (let index = start; index < this.maxVariants; index++) {
      if (usedVariants.has(index)) continue;
      const candidate = this.variant(intent, index, payload);
      if (!rejectedSignatures.has(actionSignature(candidate))) {
        return candidate;
      }
    }
    return null;
  }
}

export function isIntentName(value: string): value is IntentName {
  return INTENT_NAMES.some(name => name === value);
}

export function extractPath(request: string): string | undefined {
  return PATH.exec(request)?.[1];
}

/** First fenced code block in the request, if any. */
export function extractCode(request: string): string | undefined {
  const match = /```(?:\w+)?\n?([\s\S]*?)```/.exec(request);
  const code = match?.[1]?.trim();
  return code ? code : undefined;
}
