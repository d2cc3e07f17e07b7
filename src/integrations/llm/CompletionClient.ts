/**
 * Completion Client - Contract for chat-completion backends
 *
 * A completion backend turns one prompt into free text. Parsing and
 * validating that text is the caller's job.
 */

// =============================================================================
// REQUEST/RESPONSE TYPES
// =============================================================================

export interface CompletionOptions {
  temperature: number;
  /** Upper bound on generated tokens */
  maxTokens: number;
}

export interface CompletionClient {
  /** Provider name used in logs */
  readonly provider: string;

  /** Returns the completion text, trimmed */
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

// =============================================================================
// ERRORS
// =============================================================================

export type CompletionErrorCode = 'COMPLETION_UNAVAILABLE' | 'INVALID_COMPLETION_ENVELOPE';

export class CompletionError extends Error {
  constructor(
    message: string,
    public code: CompletionErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}
