import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

// Quantities and prices reveal a user's holdings; ids stay for debugging
const SENSITIVE_FIELDS = ['quantity', 'quantity2', 'price', 'priceUsd'];

/**
 * Copy of the request body with trading amounts redacted, for logging
 */
export function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map((item) => sanitizeRequestBody(item));
  }
  if (!body || typeof body !== 'object') {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = SENSITIVE_FIELDS.includes(key) ? '[REDACTED]' : sanitizeRequestBody(value);
  }
  return sanitized;
}

/**
 * In production, messages mentioning storage or internals are replaced with a
 * generic one; user-facing messages like "Portfolio with ID 3 not found" pass
 */
function sanitizeErrorMessage(message: string): string {
  if (env.NODE_ENV !== 'production') {
    return message;
  }

  const sensitivePatterns = [
    /database|postgres|sql|query/i,
    /file|path|directory/i,
    /internal|implementation/i,
    /column|table|constraint/i,
  ];

  return sensitivePatterns.some((pattern) => pattern.test(message))
    ? 'An error occurred while processing your request'
    : message;
}

/**
 * express.json() rejects unparsable bodies with a SyntaxError carrying status 400
 */
function isMalformedBody(err: Error): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

interface ErrorBody {
  success: false;
  error: {
    message: string;
    details?: unknown;
  };
}

/**
 * Global error handler middleware
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const err = isMalformedBody(error) ? new ValidationError('Malformed JSON body') : error;
  const known = err instanceof AppError;
  const entry = {
    error: {
      name: err.name,
      message: err.message,
      stack: known ? undefined : err.stack,
    },
    request: {
      method: req.method,
      url: req.url,
      body: sanitizeRequestBody(req.body),
    },
  };

  if (known && err.statusCode < 500) {
    logger.warn(entry, 'Request rejected');
  } else {
    logger.error(entry, 'Error occurred');
  }

  if (err instanceof AppError) {
    const body: ErrorBody = {
      success: false,
      error: {
        message: sanitizeErrorMessage(err.message),
      },
    };

    if (err instanceof ValidationError && err.errors) {
      body.error.details = err.errors;
    }

    res.status(err.statusCode).json(body);
    return;
  }

  const body: ErrorBody = {
    success: false,
    error: {
      message: 'Internal server error',
    },
  };
  res.status(500).json(body);
}
