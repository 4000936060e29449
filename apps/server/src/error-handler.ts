import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { logger, toError } from './logger.js';

const isProduction = process.env.NODE_ENV === 'production';

/**
 * Error carrying the HTTP status the API should answer with.
 */
export class HttpError extends Error {
  readonly status: ContentfulStatusCode;

  constructor(status: ContentfulStatusCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpError';
    this.status = status;
  }
}

/**
 * Sanitize error message for client response
 * In production, returns generic messages to prevent information disclosure
 */
export function sanitizeErrorMessage(error: unknown, defaultMessage: string = 'An error occurred'): string {
  if (isProduction && !(error instanceof HttpError)) {
    return defaultMessage;
  }
  return toError(error).message;
}

export function getErrorStatusCode(error: unknown): ContentfulStatusCode {
  return error instanceof HttpError ? error.status : 500;
}

/**
 * Log error with full details (server-side only)
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const err = toError(error);
  logger.error('Request error', err, {
    ...context,
    errorStack: isProduction ? undefined : err.stack,
  });
}

/**
 * Handle error and return appropriate response
 */
export function handleError(c: Context, error: unknown, defaultMessage: string = 'An error occurred'): Response {
  const statusCode = getErrorStatusCode(error);

  logError(error, {
    path: c.req.path,
    method: c.req.method,
    statusCode,
  });

  return c.json({ error: sanitizeErrorMessage(error, defaultMessage) }, statusCode);
}
