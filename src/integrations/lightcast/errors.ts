/**
 * Lightcast integration errors
 */

export type LightcastErrorCode = 'MISSING_CREDENTIALS' | 'UPSTREAM_UNAVAILABLE';

export class LightcastError extends Error {
  constructor(
    message: string,
    public code: LightcastErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LightcastError';
  }

  static missingCredentials(): LightcastError {
    return new LightcastError('Missing Lightcast credentials', 'MISSING_CREDENTIALS');
  }

  static unreachable(operation: string, cause: unknown): LightcastError {
    return new LightcastError(`Lightcast ${operation} request failed`, 'UPSTREAM_UNAVAILABLE', {
      operation,
      cause: cause instanceof Error ? cause.message : String(cause),
    });
  }

  static upstream(operation: string, status: number, statusText: string, body: string): LightcastError {
    return new LightcastError(
      `Lightcast ${operation} failed: ${status} ${statusText}${body ? ` - ${body}` : ''}`,
      'UPSTREAM_UNAVAILABLE',
      { operation, status, statusText, body }
    );
  }
}
