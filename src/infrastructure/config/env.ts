/**
 * Environment Configuration
 *
 * Typed readers over process.env. Values are read at call time so that
 * credential changes take effect without a restart.
 */

import { z } from 'zod';

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_LIGHTCAST_AUTH_URL = 'https://auth.emsicloud.com/connect/token';
export const DEFAULT_LIGHTCAST_API_URL = 'https://emsiservices.com/skills/versions/latest';
export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'llama3.2';
export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

// =============================================================================
// SCHEMAS
// =============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.string().default('development'),
  CORS_ORIGIN: z.string().default('*'),
});

const lightcastEnvSchema = z.object({
  LIGHTCAST_CLIENT_ID: optionalString,
  LIGHTCAST_CLIENT_SECRET: optionalString,
  LIGHTCAST_AUTH_URL: z.string().url().default(DEFAULT_LIGHTCAST_AUTH_URL),
  LIGHTCAST_API_URL: z.string().url().default(DEFAULT_LIGHTCAST_API_URL),
});

const completionEnvSchema = z.object({
  LLM_PROVIDER: z.enum(['ollama', 'anthropic']).default('ollama'),
  OLLAMA_BASE_URL: z.string().url().default(DEFAULT_OLLAMA_BASE_URL),
  OLLAMA_MODEL: z.string().min(1).default(DEFAULT_OLLAMA_MODEL),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().min(1).default(DEFAULT_ANTHROPIC_MODEL),
});

// =============================================================================
// TYPES
// =============================================================================

export type Env = Record<string, string | undefined>;

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  corsOrigin: string;
}

export interface LightcastConfig {
  clientId?: string;
  clientSecret?: string;
  authUrl: string;
  apiUrl: string;
}

export type CompletionProvider = 'ollama' | 'anthropic';

export interface CompletionConfig {
  provider: CompletionProvider;
  ollama: {
    baseUrl: string;
    model: string;
  };
  anthropic: {
    apiKey?: string;
    model: string;
  };
}

// =============================================================================
// READERS
// =============================================================================

export function getServerConfig(env: Env = process.env): ServerConfig {
  const parsed = serverEnvSchema.parse(env);
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    corsOrigin: parsed.CORS_ORIGIN,
  };
}

export function getLightcastConfig(env: Env = process.env): LightcastConfig {
  const parsed = lightcastEnvSchema.parse(env);
  return {
    clientId: parsed.LIGHTCAST_CLIENT_ID,
    clientSecret: parsed.LIGHTCAST_CLIENT_SECRET,
    authUrl: parsed.LIGHTCAST_AUTH_URL,
    apiUrl: parsed.LIGHTCAST_API_URL.replace(/\/+$/, ''),
  };
}

export function getCompletionConfig(env: Env = process.env): CompletionConfig {
  const parsed = completionEnvSchema.parse(env);
  return {
    provider: parsed.LLM_PROVIDER,
    ollama: {
      baseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ''),
      model: parsed.OLLAMA_MODEL,
    },
    anthropic: {
      apiKey: parsed.ANTHROPIC_API_KEY,
      model: parsed.ANTHROPIC_MODEL,
    },
  };
}

export function isLightcastConfigured(env: Env = process.env): boolean {
  const config = getLightcastConfig(env);
  return Boolean(config.clientId && config.clientSecret);
}
