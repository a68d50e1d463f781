import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodSchema } from 'zod';
import { isCircleError } from '../services/circle/index.js';

export interface ApiError extends Error {
  statusCode: number;
  details?: unknown;
}

export function createError(message: string, statusCode: number, details?: unknown): ApiError {
  const error = new Error(message) as ApiError;
  error.statusCode = statusCode;
  error.details = details;
  return error;
}

export function notFound(message = 'Resource not found'): ApiError {
  return createError(message, 404);
}

export function badRequest(message = 'Bad request', details?: unknown): ApiError {
  return createError(message, 400, details);
}

// Error handling middleware
export function errorHandler(
  err: Error | ApiError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error('Error:', err);

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation error',
      details: err.errors,
    });
    return;
  }

  // Circle errors that escape the per-location isolation (e.g. a broken locations file)
  if (isCircleError(err)) {
    res.status(422).json({
      error: err.message,
      kind: err.kind,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }

  const statusCode = 'statusCode' in err ? err.statusCode : 500;

  // In production, mask internal error messages on 500s to avoid leaking implementation details
  const message = statusCode >= 500 && process.env.NODE_ENV === 'production'
    ? 'Internal server error'
    : err.message || 'Internal server error';

  res.status(statusCode).json({
    error: message,
    ...('details' in err && err.details ? { details: err.details } : {}),
  });
}

// Validation middleware factory
export function validate<T>(schema: ZodSchema<T>, source: 'body' | 'query' | 'params' = 'body') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const data = req[source];
    const result = schema.safeParse(data);

    if (!result.success) {
      throw result.error;
    }

    // Replace with parsed data (includes defaults and transformations).
    // query and params are typed string maps, so parsed values are merged in.
    if (source === 'body') {
      req.body = result.data;
    } else {
      Object.assign(req[source], result.data);
    }
    next();
  };
}
