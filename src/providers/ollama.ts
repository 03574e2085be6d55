/**
 * Ollama Provider — local LLM integration via the Ollama REST API.
 *
 * Uses fetch() against Ollama's HTTP API (default: http://localhost:11434):
 * chat completions via POST /api/chat, health check via GET /api/tags.
 */

import { z } from 'zod';
import { BaseLLMProvider } from './base.js';
import type { LLMRequest, LLMResponse, ProviderConfig } from './types.js';
import { ProviderError, toError } from '../core/errors.js';

const ChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({ content: z.string().default('') }).default({}),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
  done_reason: z.string().optional(),
});

export class OllamaProvider extends BaseLLMProvider {
  readonly name = 'ollama';
  readonly defaultModel: string;

  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(config: ProviderConfig = {}) {
    super(config);
    this.baseUrl = (config.baseUrl || process.env.OLLAMA_BASE_URL || 'http://localhost:11434').replace(/\/+$/, '');
    this.defaultModel = config.defaultModel || 'llama3.1';
    this.fetchImpl = config.fetch ?? fetch;
  }

  async isAvailable(): Promise<boolean> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), 3000);
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/tags`, { signal: controller.signal });
      return response.ok;
    } catch {
      return false;
    } finally {
      clearTimeout(timeout);
    }
  }

  protected async _complete(request: LLMRequest): Promise<LLMResponse> {
    const body = {
      model: request.model || this.defaultModel,
      messages: request.messages.map(m => ({ role: m.role, content: m.content })),
      stream: false,
      options: {
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.maxTokens ? { num_predict: request.maxTokens } : {}),
      },
    };

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: request.signal,
      });
    } catch (err) {
      throw new ProviderError(`Ollama unreachable at ${this.baseUrl}`, this.name, 'service-unavailable', toError(err));
    }

    if (!response.ok) {
      const errorText = await response.text();
      const kind = response.status === 429 ? 'rate-limited' : 'service-unavailable';
      throw new ProviderError(`Ollama API error (${response.status}): ${errorText}`, this.name, kind);
    }

    const parsed = ChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError('Ollama returned an unexpected response body', this.name, 'service-unavailable');
    }
    const data = parsed.data;

    // Ollama reports eval_count for output tokens and prompt_eval_count for input
    const inputTokens = data.prompt_eval_count ?? 0;
    const outputTokens = data.eval_count ?? 0;

    return {
      content: data.message.content,
      model: data.model || body.model,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
      finishReason: data.done_reason === 'length' ? 'length' : 'stop',
    };
  }
}
