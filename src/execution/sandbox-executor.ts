/**
 * Runs `execute-code` payloads inside a node:vm context.
 *
 * The context starts from a null-prototype global and receives no host
 * object: console and output capture are defined by a prelude script inside
 * the context, and output leaves it only as a JSON string. String code
 * generation and WASM compilation are disabled, and every script run in the
 * context is stopped after `timeoutMs` of CPU time.
 */

import vm from 'node:vm';
import { performance } from 'node:perf_hooks';
import { types } from 'node:util';
import { z } from 'zod';
import type { ActionKind, ProposedAction } from '../simulation/types.js';
import type { ActionExecutor, ActionOutcome } from './types.js';
import { ExecutorError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

export interface SandboxOptions {
  timeoutMs?: number;
  /** Characters of captured output kept. */
  maxOutput?: number;
}

const PRELUDE = `
(() => {
  const output = [];
  const stringify = JSON.stringify;
  const format = (value) => {
    if (typeof value === 'string') return value;
    try {
      const text = stringify(value);
      return text === undefined ? String(value) : text;
    } catch {
      return String(value);
    }
  };
  const capture = (...args) => { output.push(args.map(format).join(' ')); };
  const result = Object.seal({ value: undefined });
  const fixed = (value) => ({ value, writable: false, configurable: false, enumerable: false });
  Object.defineProperties(globalThis, {
    console: fixed(Object.freeze({ log: capture, info: capture, warn: capture, error: capture })),
    __sandboxDrain: fixed(() => stringify(output)),
    __sandboxFormat: fixed(format),
    __sandboxResult: fixed(result),
  });
  return result;
})();
`;

const OutputSchema = z.array(z.string());

export class SandboxCodeExecutor implements ActionExecutor {
  readonly name = 'sandbox';
  readonly kinds: readonly ActionKind[] = ['execute-code'];
  private timeoutMs: number;
  private maxOutput: number;
  private logger = getLogger();

  constructor(options: SandboxOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 1000;
    this.maxOutput = options.maxOutput ?? 10_000;
  }

  async execute(action: ProposedAction): Promise<ActionOutcome> {
    if (action.kind !== 'execute-code') {
      throw new ExecutorError(`Sandbox refuses "${action.kind}" actions`, action.id);
    }

    const code = action.payload?.code;
    if (!code || !code.trim()) {
      return {
        actionId: action.id,
        success: false,
        output: '',
        error: 'Action carries no code to run',
        dryRun: false,
        durationMs: 0,
      };
    }

    const startTime = performance.now();
    const context = vm.createContext(Object.create(null), {
      name: `sandbox-${action.id}`,
      codeGeneration: { strings: false, wasm: false },
    });
    const inContext = (source: string): unknown =>
      new vm.Script(source).runInContext(context, { timeout: this.timeoutMs });

    // A sealed plain object made by the prelude; setting its data property runs no script code.
    const resultSlot = inContext(PRELUDE);

    let error: string | undefined;
    try {
      const script = new vm.Script(code, { filename: `action-${action.id}.js` });
      const result: unknown = script.runInContext(context, { timeout: this.timeoutMs });
      if (result !== undefined && typeof resultSlot === 'object' && resultSlot !== null) {
        Reflect.set(resultSlot, 'value', result);
        inContext('console.log(__sandboxFormat(__sandboxResult.value));');
      }
    } catch (err) {
      error = errorMessage(err);
      this.logger.warn({ actionId: action.id, error }, 'Sandboxed code failed');
    }

    const lines = this.readOutput(inContext);
    if (lines === null && error === undefined) {
      error = 'Sandbox output could not be read';
    }

    return {
      actionId: action.id,
      success: error === undefined,
      output: (lines ?? []).join('\n').slice(0, this.maxOutput),
      ...(error !== undefined ? { error } : {}),
      dryRun: false,
      durationMs: performance.now() - startTime,
    };
  }

  private readOutput(inContext: (source: string) => unknown): string[] | null {
    try {
      const raw = inContext('__sandboxDrain()');
      if (typeof raw !== 'string') return null;
      const parsed = OutputSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (err) {
      this.logger.warn({ error: err instanceof Error ? err.message : 'unknown' }, 'Sandbox output could not be read');
      return null;
    }
  }
}

// Values thrown by the code belong to the context's realm. Only an own data
// property of a native error is read, so no getter or proxy trap runs here.
function errorMessage(err: unknown): string {
  if (types.isNativeError(err)) {
    const message = Object.getOwnPropertyDescriptor(err, 'message');
    if (message && typeof message.value === 'string') return message.value;
    return 'Sandboxed code threw an error without a readable message';
  }
  if (typeof err === 'string') return err;
  if (typeof err === 'number' || typeof err === 'boolean') return String(err);
  return 'Sandboxed code threw a non-error value';
}

/** Compile without running; the syntax error message, or null when the code parses. */
export function checkSyntax(code: string): string | null {
  try {
    new vm.Script(code, { filename: 'draft.js' });
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : 'Code does not compile';
  }
}
