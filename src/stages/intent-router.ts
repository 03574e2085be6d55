import { z } from 'zod';
import type { Diagnostic } from '../core/types.js';
import type { LLMProvider } from '../providers/types.js';
import { completeText } from '../providers/index.js';
import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';
import { ActionPlanner, INTENT_NAMES, type Intent } from './action-planner.js';

const RouteSchema = z.object({
  intent: z.enum(INTENT_NAMES),
  difficulty: z.number().int().min(1).max(10),
});

const ROUTER_SYSTEM = [
  'Classify the request into exactly one intent and rate its difficulty from 1 to 10.',
  `Intents: ${INTENT_NAMES.join(', ')}.`,
  'Reply with JSON only, e.g. {"intent": "research", "difficulty": 3}.',
].join('\n');

/**
 * Model-backed intent classification. The keyword rules stay authoritative
 * for safety: a reply that maps an irreversible request onto a reversible
 * intent is ignored.
 */
export class IntentRouter {
  private logger = getLogger();

  constructor(
    private readonly planner: ActionPlanner,
    private readonly llm: LLMProvider,
  ) {}

  async route(request: string, signal: AbortSignal, diagnostics: Diagnostic[]): Promise<Intent> {
    const byRules = this.planner.classify(request);

    let reply: string;
    try {
      reply = await completeText(this.llm, request, {
        system: ROUTER_SYSTEM,
        temperature: 0,
        maxTokens: 64,
        signal,
      });
    } catch (err) {
      const error = toError(err);
      this.logger.warn({ error: error.message }, 'Intent routing failed, using keyword rules');
      diagnostics.push({ severity: 'degraded', code: 'llm-unavailable', message: error.message });
      return byRules;
    }

    const route = parseRoute(reply);
    if (!route) {
      diagnostics.push({
        severity: 'info',
        code: 'intent-fallback',
        message: `Unreadable intent reply, keeping rule intent "${byRules.name}"`,
      });
      return byRules;
    }

    const routed = this.planner.intentFor(route.intent, request, route.difficulty);
    if (byRules.irreversible && !routed.irreversible) {
      diagnostics.push({
        severity: 'info',
        code: 'intent-fallback',
        message: `Model intent "${route.intent}" would drop the irreversible rule intent "${byRules.name}"`,
      });
      return { ...byRules, difficulty: route.difficulty };
    }
    return routed;
  }
}

export function parseRoute(reply: string): z.infer<typeof RouteSchema> | null {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start < 0 || end <= start) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(reply.slice(start, end + 1));
  } catch {
    return null;
  }
  const parsed = RouteSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
