/**
 * Claude Client - Hosted chat-completion backend
 *
 * Alternative to the local Ollama backend, selected with
 * LLM_PROVIDER=anthropic. Same contract: one user prompt in, text out.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { Message, MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import { CompletionError, type CompletionClient, type CompletionOptions } from './CompletionClient.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface ClaudeClientConfig {
  apiKey: string;
  model: string;
  maxRetries: number;
  timeoutMs: number;
}

/** The slice of the SDK's messages resource this client calls */
export interface MessageCreator {
  create(params: MessageCreateParamsNonStreaming): Promise<Pick<Message, 'content' | 'model' | 'stop_reason'>>;
}

const DEFAULT_CONFIG = {
  maxRetries: 0,
  timeoutMs: 120000,
};

// =============================================================================
// CLAUDE CLIENT
// =============================================================================

export class ClaudeClient implements CompletionClient {
  readonly provider = 'anthropic';

  private messages: MessageCreator;
  private config: ClaudeClientConfig;

  constructor(
    config: Pick<ClaudeClientConfig, 'apiKey' | 'model'> & Partial<ClaudeClientConfig>,
    messages?: MessageCreator
  ) {
    this.config = {
      apiKey: config.apiKey,
      model: config.model,
      maxRetries: config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
      timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    };

    if (!this.config.apiKey) {
      throw new CompletionError('ANTHROPIC_API_KEY is required', 'COMPLETION_UNAVAILABLE', { provider: 'anthropic' });
    }

    this.messages =
      messages ??
      new Anthropic({
        apiKey: this.config.apiKey,
        maxRetries: this.config.maxRetries,
        timeout: this.config.timeoutMs,
      }).messages;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const startTime = Date.now();

    const response = await this.messages
      .create({
        model: this.config.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        messages: [{ role: 'user', content: prompt }],
      })
      .catch((error: unknown) => {
        throw this.toCompletionError(error);
      });

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();

    if (!text) {
      throw new CompletionError('Anthropic API returned no text content', 'INVALID_COMPLETION_ENVELOPE', {
        stopReason: response.stop_reason,
      });
    }

    console.log(`[ClaudeClient] ${response.model} responded in ${Date.now() - startTime}ms`);
    return text;
  }

  private toCompletionError(error: unknown): unknown {
    if (error instanceof Anthropic.APIError) {
      console.error(`[ClaudeClient] API error: ${error.status ?? 'no status'}`, error.message);
      return new CompletionError(
        `Anthropic API error (${error.status ?? 'no status'}): ${error.message}`,
        'COMPLETION_UNAVAILABLE',
        { status: error.status }
      );
    }
    return error;
  }
}
