import type { MindgateConfig } from '../core/types.js';
import type { CompletionOptions, LLMMessage, LLMProvider } from './types.js';
import { OllamaProvider } from './ollama.js';

export * from './types.js';
export { BaseLLMProvider } from './base.js';
export { OllamaProvider } from './ollama.js';

/**
 * `complete(prompt, options) -> text` over a chat-style provider.
 */
export async function completeText(
  provider: LLMProvider,
  prompt: string,
  options: CompletionOptions = {},
): Promise<string> {
  const messages: LLMMessage[] = [];
  if (options.system) {
    messages.push({ role: 'system', content: options.system });
  }
  messages.push({ role: 'user', content: prompt });

  const response = await provider.complete({
    messages,
    model: options.model,
    temperature: options.temperature,
    maxTokens: options.maxTokens,
    signal: options.signal,
  });
  return response.content.trim();
}

/** Provider for the configured backend, or null when running without a model. */
export function createProvider(config: MindgateConfig['llm']): LLMProvider | null {
  if (config.provider === 'none') return null;
  return new OllamaProvider({
    baseUrl: config.baseUrl,
    defaultModel: config.model,
    maxRetries: config.maxRetries,
  });
}
