/**
 * Mock LLM Provider for Testing
 */

import type { LLMProvider, LLMRequest, LLMResponse } from '../../src/providers/types.js';
import { ProviderError, type ProviderFailureKind } from '../../src/core/errors.js';

export class MockProvider implements LLMProvider {
  name = 'mock';
  defaultModel = 'mock-model';
  responses: string[];
  calls: LLMRequest[] = [];
  failure: ProviderFailureKind | null = null;
  private responseIndex = 0;

  constructor(responses: string[] = ['Mock response']) {
    this.responses = responses;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.calls.push(request);
    if (this.failure) {
      throw new ProviderError(`mock ${this.failure}`, this.name, this.failure);
    }
    const content = this.responses[this.responseIndex % this.responses.length];
    this.responseIndex++;
    return {
      content,
      model: this.defaultModel,
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
      finishReason: 'stop',
    };
  }

  async isAvailable(): Promise<boolean> {
    return this.failure === null;
  }

  /**
   * Make every following call fail with the given kind
   */
  failWith(kind: ProviderFailureKind): void {
    this.failure = kind;
  }

  /** Text of the last user message sent */
  lastPrompt(): string {
    const last = this.calls[this.calls.length - 1];
    return last?.messages.filter(m => m.role === 'user').map(m => m.content).join('\n') ?? '';
  }
}
