/**
 * LLM Integration Module
 *
 * Completion backends (Ollama by default, Anthropic optionally) and the
 * prompt templates sent to them.
 */

import { getCompletionConfig, type CompletionConfig } from '../../infrastructure/config/env.js';
import type { CompletionClient, CompletionOptions } from './CompletionClient.js';
import { OllamaClient } from './OllamaClient.js';
import { ClaudeClient } from './ClaudeClient.js';

export { CompletionError, type CompletionClient, type CompletionOptions, type CompletionErrorCode } from './CompletionClient.js';
export { OllamaClient, type OllamaClientConfig } from './OllamaClient.js';
export { ClaudeClient, type ClaudeClientConfig, type MessageCreator } from './ClaudeClient.js';
export * from './PromptTemplates.js';

// =============================================================================
// FACTORY
// =============================================================================

export function createCompletionClient(config: CompletionConfig = getCompletionConfig()): CompletionClient {
  if (config.provider === 'anthropic') {
    return new ClaudeClient({
      apiKey: config.anthropic.apiKey ?? '',
      model: config.anthropic.model,
    });
  }

  return new OllamaClient({
    baseUrl: config.ollama.baseUrl,
    model: config.ollama.model,
  });
}

/**
 * Completion client built from the current environment on every call,
 * so backend settings are picked up per request.
 */
export class ConfiguredCompletionClient implements CompletionClient {
  get provider(): string {
    return getCompletionConfig().provider;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    return createCompletionClient().complete(prompt, options);
  }
}
