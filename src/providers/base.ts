import type { LLMProvider, LLMRequest, LLMResponse, ProviderConfig } from './types.js';
import { getLogger } from '../core/logger.js';
import { ProviderError } from '../core/errors.js';
import { retry } from '../utils/retry.js';

export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly defaultModel: string;

  protected logger = getLogger();
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = {
      maxRetries: 2,
      retryDelayMs: 1000,
      ...config,
    };
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const model = request.model || this.defaultModel;
    this.logger.debug({ provider: this.name, model }, 'LLM request');

    // Only rate limits are retried; an unavailable service fails at once.
    return retry(() => this._complete({ ...request, model }), {
      maxRetries: this.config.maxRetries ?? 2,
      baseDelay: this.config.retryDelayMs ?? 1000,
      retryable: error => error instanceof ProviderError && error.kind === 'rate-limited',
      signal: request.signal,
      onRetry: (attempt, error) => {
        this.logger.warn({ provider: this.name, attempt, error: error.message }, 'Retrying LLM call');
      },
    });
  }

  abstract isAvailable(): Promise<boolean>;

  protected abstract _complete(request: LLMRequest): Promise<LLMResponse>;
}
