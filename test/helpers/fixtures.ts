/**
 * Shared builders for actions, lessons and configuration
 */

import { MindgateConfigSchema, type MindgateConfig, type MindgateConfigInput } from '../../src/core/types.js';
import type { Lesson } from '../../src/memory/types.js';
import type { ProposedAction } from '../../src/simulation/types.js';

let counter = 0;

export function makeAction(overrides: Partial<ProposedAction> = {}): ProposedAction {
  counter++;
  return {
    id: `action-${counter}`,
    kind: 'execute-code',
    pattern: 'execute-code',
    description: 'run a snippet',
    target: 'sandbox',
    magnitude: 0.3,
    resourceCost: 0.3,
    irreversible: false,
    variant: 0,
    ...overrides,
  };
}

export function makeLesson(overrides: Partial<Lesson> = {}): Lesson {
  counter++;
  return {
    id: `lesson-${counter}`,
    runId: `run-${counter}`,
    summary: 'Request "delete all files in /" failed',
    actionPattern: 'delete-all',
    actionKind: 'delete',
    cause: 'safety-ceiling: too risky',
    avoidance: 'NEVER propose irreversible "delete-all" actions on /',
    request: 'delete all files in /',
    createdAt: 1_700_000_000_000 + counter,
    tags: ['safety-ceiling'],
    ...overrides,
  };
}

export function testConfig(input: MindgateConfigInput = {}): MindgateConfig {
  return MindgateConfigSchema.parse(input);
}
