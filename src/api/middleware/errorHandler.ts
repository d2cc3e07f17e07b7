/**
 * Error Handler Middleware
 *
 * Centralized error handling for the API.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { LightcastError } from '../../integrations/lightcast/errors.js';
import { CompletionError } from '../../integrations/llm/CompletionClient.js';
import { RecoveryError } from '../../domain/services/ResponseRecovery.js';

// =============================================================================
// ERROR TYPES
// =============================================================================

export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class BadRequestError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'BAD_REQUEST', details);
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(
      id ? `${resource} not found: ${id}` : `${resource} not found`,
      404,
      'NOT_FOUND',
      { resource, id }
    );
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 422, 'VALIDATION_ERROR', details);
  }
}

// =============================================================================
// ERROR RESPONSE TYPE
// =============================================================================

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    details?: Record<string, unknown>;
    requestId?: string;
  };
}

function requestIdOf(req: Request): string | undefined {
  const header = req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

/**
 * Map errors raised outside the routes onto the ApiError family
 */
export function toApiError(err: Error): ApiError | null {
  if (err instanceof ApiError) return err;

  if (err instanceof LightcastError) {
    return new ApiError(err.message, err.code === 'MISSING_CREDENTIALS' ? 401 : 502, err.code, err.details);
  }

  if (err instanceof CompletionError || err instanceof RecoveryError) {
    return new ApiError(err.message, 502, err.code, err.details);
  }

  if (err instanceof ZodError) {
    return new ValidationError('Validation error', { errors: err.errors });
  }

  if (err instanceof RangeError) {
    return new BadRequestError(err.message);
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return new BadRequestError('Malformed JSON body');
  }

  return null;
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error('API Error:', {
    name: err.name,
    message: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  const requestId = requestIdOf(req);
  const apiError = toApiError(err);

  if (apiError) {
    res.status(apiError.statusCode).json({
      error: {
        message: apiError.message,
        code: apiError.code,
        details: apiError.details,
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  res.status(500).json({
    error: {
      message:
        process.env.NODE_ENV === 'production'
          ? 'Internal server error'
          : err.message,
      code: 'INTERNAL_ERROR',
      requestId,
    },
  } satisfies ErrorResponse);
}

// =============================================================================
// NOT FOUND HANDLER
// =============================================================================

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      code: 'ROUTE_NOT_FOUND',
      requestId: requestIdOf(req),
    },
  } satisfies ErrorResponse);
}
