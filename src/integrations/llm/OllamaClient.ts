/**
 * Ollama Client - Local chat-completion backend
 *
 * Calls POST /api/chat with streaming disabled. The reply text is read from
 * `message.content`, or from `response` for servers answering in the
 * /api/generate shape.
 *
 * API Docs: https://github.com/ollama/ollama/blob/main/docs/api.md
 */

import { z } from 'zod';
import { CompletionError, type CompletionClient, type CompletionOptions } from './CompletionClient.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface OllamaClientConfig {
  baseUrl: string;
  model: string;
}

const ollamaEnvelopeSchema = z.object({
  message: z
    .object({
      content: z.string().nullish(),
    })
    .nullish(),
  response: z.string().nullish(),
});

// =============================================================================
// OLLAMA CLIENT
// =============================================================================

export class OllamaClient implements CompletionClient {
  readonly provider = 'ollama';

  constructor(private config: OllamaClientConfig) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const url = `${this.config.baseUrl}/api/chat`;
    const startTime = Date.now();

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        stream: false,
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens,
        },
      }),
    }).catch((error: unknown) => {
      console.error(`[OllamaClient] Request to ${url} failed:`, error);
      throw new CompletionError(`Ollama API unreachable at ${this.config.baseUrl}`, 'COMPLETION_UNAVAILABLE', {
        cause: error instanceof Error ? error.message : String(error),
      });
    });

    if (!response.ok) {
      const errorText = await response.text();
      console.error(`[OllamaClient] API error: ${response.status}`, errorText);
      throw new CompletionError(`Ollama API error (${response.status}): ${errorText}`, 'COMPLETION_UNAVAILABLE', {
        status: response.status,
        body: errorText,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      console.error('[OllamaClient] Failed to parse API response as JSON:', error);
      throw new CompletionError('Invalid JSON response from Ollama API', 'INVALID_COMPLETION_ENVELOPE');
    }

    const envelope = ollamaEnvelopeSchema.safeParse(payload);
    const text = envelope.success ? envelope.data.message?.content || envelope.data.response : undefined;

    if (!text) {
      console.error('[OllamaClient] Invalid response structure:', JSON.stringify(payload, null, 2));
      throw new CompletionError('Invalid response structure from Ollama API', 'INVALID_COMPLETION_ENVELOPE');
    }

    console.log(`[OllamaClient] ${this.config.model} responded in ${Date.now() - startTime}ms`);
    return text.trim();
  }
}
