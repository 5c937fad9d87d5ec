import type { Request, Response, NextFunction } from 'express';
import { isAppError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

const SENSITIVE_KEY_PATTERNS = [/password/i, /secret/i, /token/i, /api[_-]?key/i, /auth/i];

/**
 * Global error handler middleware
 * Maps domain errors to HTTP status codes and logs with redacted request context
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const context = {
      method: req.method,
      path: req.path,
      ip: req.ip,
      body: redactKeys(req.body),
    };

    if (isAppError(err)) {
      logger.error('Application error', {
        code: err.code,
        message: err.message,
        details: redactKeys(err.details),
        stack: env.NODE_ENV === 'development' ? err.stack : undefined,
        ...context,
      });

      res.status(err.statusCode).json({
        error: err.code,
        message: err.message,
        ...(err.details ? { details: redactKeys(err.details) } : {}),
      });
    } else if (err.name === 'SyntaxError' && 'body' in err) {
      // JSON parsing error from express.json()
      logger.warn('Invalid JSON in request', {
        message: err.message,
        ...context,
      });

      res.status(400).json({
        error: 'INVALID_JSON',
        message: 'Invalid JSON in request body',
      });
    } else {
      logger.error('Unexpected error', {
        message: err.message,
        name: err.name,
        stack: err.stack,
        ...context,
      });

      res.status(500).json({
        error: 'INTERNAL_SERVER_ERROR',
        message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
      });
    }
  };
}

/**
 * Replaces values under sensitive-looking keys before they reach a log line
 */
export function redactKeys(obj: unknown): unknown {
  if (!obj || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactKeys);
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key))) {
      redacted[key] = '[REDACTED]';
    } else {
      redacted[key] = redactKeys(value);
    }
  }
  return redacted;
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
