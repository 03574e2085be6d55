export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMRequest {
  messages: LLMMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason: 'stop' | 'length' | 'error';
}

/**
 * Text-completion service. Failures surface as ProviderError with kind
 * "service-unavailable" or "rate-limited".
 */
export interface LLMProvider {
  readonly name: string;
  readonly defaultModel: string;

  complete(request: LLMRequest): Promise<LLMResponse>;
  isAvailable(): Promise<boolean>;
}

export interface CompletionOptions {
  system?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface ProviderConfig {
  baseUrl?: string;
  defaultModel?: string;
  maxRetries?: number;
  /** Base backoff delay between rate-limited attempts. */
  retryDelayMs?: number;
  fetch?: typeof fetch;
}
