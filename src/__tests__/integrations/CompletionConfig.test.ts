/**
 * Completion backend selection and prompt filling
 */

import { describe, it, expect } from '@jest/globals';
import {
  ClaudeClient,
  OllamaClient,
  buildPrompt,
  createCompletionClient,
  withJsonReminder,
  JSON_ONLY_REMINDER,
} from '../../integrations/llm/index.js';
import {
  getCompletionConfig,
  getLightcastConfig,
  getServerConfig,
  isLightcastConfigured,
  DEFAULT_LIGHTCAST_API_URL,
} from '../../infrastructure/config/env.js';

describe('environment configuration', () => {
  it('defaults to the local Ollama backend', () => {
    expect(getCompletionConfig({})).toEqual({
      provider: 'ollama',
      ollama: { baseUrl: 'http://localhost:11434', model: 'llama3.2' },
      anthropic: { apiKey: undefined, model: 'claude-sonnet-4-20250514' },
    });
  });

  it('strips trailing slashes from service URLs', () => {
    expect(getLightcastConfig({ LIGHTCAST_API_URL: 'https://skills.test/versions/latest/' }).apiUrl).toBe(
      'https://skills.test/versions/latest'
    );
    expect(getLightcastConfig({}).apiUrl).toBe(DEFAULT_LIGHTCAST_API_URL);
  });

  it('treats blank credentials as missing', () => {
    expect(isLightcastConfigured({ LIGHTCAST_CLIENT_ID: 'test-client', LIGHTCAST_CLIENT_SECRET: '  ' })).toBe(false);
    expect(isLightcastConfigured({ LIGHTCAST_CLIENT_ID: 'test-client', LIGHTCAST_CLIENT_SECRET: 'test-secret' })).toBe(
      true
    );
  });

  it('reads the server port', () => {
    expect(getServerConfig({ PORT: '8080' })).toEqual({ port: 8080, nodeEnv: 'development', corsOrigin: '*' });
  });

  it('rejects an unknown provider', () => {
    expect(() => getCompletionConfig({ LLM_PROVIDER: 'gpt' })).toThrow();
  });
});

describe('createCompletionClient', () => {
  it('builds an Ollama client by default', () => {
    const client = createCompletionClient(getCompletionConfig({}));
    expect(client).toBeInstanceOf(OllamaClient);
    expect(client.provider).toBe('ollama');
  });

  it('builds a Claude client when selected', () => {
    const client = createCompletionClient(
      getCompletionConfig({ LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-key' })
    );
    expect(client).toBeInstanceOf(ClaudeClient);
  });

  it('requires an API key for the Claude client', () => {
    expect(() => createCompletionClient(getCompletionConfig({ LLM_PROVIDER: 'anthropic' }))).toThrow(
      'ANTHROPIC_API_KEY is required'
    );
  });
});

describe('PromptTemplates', () => {
  it('replaces every occurrence of a placeholder', () => {
    expect(buildPrompt('{{a}} and {{a}}, then {{b}}', { a: 'x', b: 3 })).toBe('x and x, then 3');
  });

  it('inserts replacement patterns literally', () => {
    expect(buildPrompt('Skill: {{name}}', { name: "$& $' $1" })).toBe("Skill: $& $' $1");
  });

  it('leaves unknown placeholders in place', () => {
    expect(buildPrompt('{{known}} {{unknown}}', { known: 'k' })).toBe('k {{unknown}}');
  });

  it('appends the JSON reminder', () => {
    expect(withJsonReminder('Prompt')).toBe(`Prompt\n\n${JSON_ONLY_REMINDER}`);
  });
});
