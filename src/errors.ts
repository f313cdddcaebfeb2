/**
 * Standardized API error types and utilities
 */

import type { CalculationError } from './calculator/types.js';

/**
 * Error codes for API responses
 */
export type ApiErrorCode =
  | 'VALIDATION_ERROR'
  | 'CALCULATION_ERROR'
  | 'INTERNAL_ERROR'
  | 'TIMEOUT_ERROR'
  | 'NOT_FOUND';

/**
 * Standardized error response structure
 */
export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    details?: unknown;
  };
}

/**
 * Custom API error class for controlled error responses
 */
export class ApiError extends Error {
  constructor(
    public readonly code: ApiErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }

  /**
   * Convert to standardized response format
   */
  toResponse(): ApiErrorResponse {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined ? { details: this.details } : {}),
      },
    };
  }
}

/**
 * Sanitize error messages to prevent secret leakage
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/api_?key=[^&\s]+/gi, (match) => `${match.slice(0, match.indexOf('=') + 1)}***`)
    .replace(/(OPENROUTESERVICE|YANDEX)_API_KEY/gi, '***')
    .replace(/[a-zA-Z0-9_-]{32,}/g, '***'); // Generic long token pattern
}

/**
 * Map a calculation precondition failure to a 400 response
 */
export function fromCalculationError(error: CalculationError): ApiError {
  return new ApiError('CALCULATION_ERROR', error.message, 400, { kind: error.kind });
}

/**
 * Build a 400 from zod issues
 */
export function invalidRequest(
  issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>,
  message = 'Invalid request body'
): ApiError {
  return new ApiError(
    'VALIDATION_ERROR',
    message,
    400,
    issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
    }))
  );
}

/**
 * Convert any error to a standardized ApiError.
 * Unknown failures become an opaque INTERNAL_ERROR; the detail belongs in the log only.
 */
export function toApiError(error: unknown, internalMessage = 'Internal server error'): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  // Fastify's own 4xx errors (malformed JSON, unsupported media type, ...)
  if (isClientHttpError(error)) {
    return new ApiError('VALIDATION_ERROR', sanitizeErrorMessage(error.message), error.statusCode);
  }

  const message = error instanceof Error ? error.message : '';
  if (message.includes('timeout') || message.includes('Timeout')) {
    return new ApiError('TIMEOUT_ERROR', 'Request timed out', 504);
  }

  return new ApiError('INTERNAL_ERROR', internalMessage, 500);
}

function isClientHttpError(error: unknown): error is Error & { statusCode: number } {
  if (!(error instanceof Error) || !('statusCode' in error)) return false;
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
}
