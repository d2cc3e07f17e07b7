/**
 * Lightcast Auth - OAuth client-credentials token provider
 *
 * Tokens are not cached: every call exchanges the configured credentials
 * for a fresh bearer token. Credentials are read at call time.
 */

import { getLightcastConfig, type LightcastConfig } from '../../infrastructure/config/env.js';
import { LightcastError } from './errors.js';
import { tokenResponseSchema } from './types.js';

const LIGHTCAST_SCOPE = 'emsi_open';

export class LightcastAuth {
  constructor(private readConfig: () => LightcastConfig = () => getLightcastConfig()) {}

  async getToken(): Promise<string> {
    const config = this.readConfig();

    if (!config.clientId || !config.clientSecret) {
      throw LightcastError.missingCredentials();
    }

    const response = await fetch(config.authUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({
        client_id: config.clientId,
        client_secret: config.clientSecret,
        grant_type: 'client_credentials',
        scope: LIGHTCAST_SCOPE,
      }),
    }).catch((error: unknown) => {
      console.error('[LightcastAuth] Token request could not be sent:', error);
      throw LightcastError.unreachable('auth', error);
    });

    if (!response.ok) {
      const body = await response.text();
      console.error(`[LightcastAuth] Token request failed: ${response.status}`, body);
      throw LightcastError.upstream('auth', response.status, response.statusText, body);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new LightcastError('Lightcast auth returned invalid JSON', 'UPSTREAM_UNAVAILABLE', {
        operation: 'auth',
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new LightcastError('Failed to get token', 'UPSTREAM_UNAVAILABLE', { operation: 'auth' });
    }

    return parsed.data.access_token;
  }
}
