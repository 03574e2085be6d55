import { describe, it, expect } from 'vitest';
import type { Diagnostic } from '../../../src/core/types.js';
import { ActionPlanner } from '../../../src/stages/action-planner.js';
import { IntentRouter, parseRoute } from '../../../src/stages/intent-router.js';
import { MockProvider } from '../../helpers/mock-provider.js';

const signal = new AbortController().signal;
const planner = new ActionPlanner();

async function route(reply: string, request: string) {
  const llm = new MockProvider([reply]);
  const diagnostics: Diagnostic[] = [];
  const intent = await new IntentRouter(planner, llm).route(request, signal, diagnostics);
  return { intent, diagnostics, llm };
}

describe('IntentRouter', () => {
  it('should take the intent and difficulty chosen by the model', async () => {
    const { intent, diagnostics } = await route('{"intent": "research", "difficulty": 4}', 'tell me about quasars');

    expect(intent).toMatchObject({ name: 'research', difficulty: 4, kind: 'respond', pattern: 'research' });
    expect(diagnostics).toEqual([]);
  });

  it('should read JSON wrapped in a code fence', async () => {
    const { intent } = await route('```json\n{"intent": "summarize", "difficulty": 2}\n```', 'tell me about quasars');
    expect(intent.name).toBe('summarize');
  });

  it('should ask deterministically with the list of intents', async () => {
    const { llm } = await route('{"intent": "respond", "difficulty": 1}', 'hello');

    expect(llm.calls[0].temperature).toBe(0);
    expect(llm.calls[0].messages[0].content).toContain(
      'Intents: destructive, spend, deploy, commit, issue, modify, code, research, summarize, respond.',
    );
  });

  it.each([
    ['prose', 'I would call this research'],
    ['an unknown intent', '{"intent": "hack", "difficulty": 3}'],
    ['a difficulty out of range', '{"intent": "research", "difficulty": 11}'],
    ['broken JSON', '{"intent": "research",'],
  ])('should fall back to the keyword rules on %s', async (_case, reply) => {
    const { intent, diagnostics } = await route(reply, 'tell me about quasars');

    expect(intent.name).toBe('respond');
    expect(diagnostics).toEqual([{
      severity: 'info',
      code: 'intent-fallback',
      message: 'Unreadable intent reply, keeping rule intent "respond"',
    }]);
  });

  it('should fall back to the keyword rules when the model is unavailable', async () => {
    const llm = new MockProvider();
    llm.failWith('service-unavailable');
    const diagnostics: Diagnostic[] = [];

    const intent = await new IntentRouter(planner, llm).route('summarize topic X', signal, diagnostics);

    expect(intent).toEqual(planner.classify('summarize topic X'));
    expect(diagnostics).toEqual([{ severity: 'degraded', code: 'llm-unavailable', message: 'mock service-unavailable' }]);
  });

  it('should not let the model turn an irreversible request into a reversible one', async () => {
    const { intent, diagnostics } = await route('{"intent": "summarize", "difficulty": 1}', 'delete all files in /');

    expect(intent).toMatchObject({ name: 'destructive', pattern: 'delete-all', irreversible: true, difficulty: 1 });
    expect(diagnostics[0].message).toBe('Model intent "summarize" would drop the irreversible rule intent "destructive"');
  });
});

describe('parseRoute', () => {
  it('should extract the first JSON object from the reply', () => {
    expect(parseRoute('Sure: {"intent": "code", "difficulty": 5} done')).toEqual({ intent: 'code', difficulty: 5 });
  });

  it('should return null without an object', () => {
    expect(parseRoute('code, 5')).toBeNull();
  });
});
