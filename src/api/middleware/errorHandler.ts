// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isCultivationError, SessionLimitError } from '@/utils/errors.js';
import { apiLogger } from '@/utils/logger.js';

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
  details?: unknown;
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string,
  details?: unknown
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  return error;
}

interface NormalizedError {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
  stack?: string;
}

function normalize(err: unknown): NormalizedError {
  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: 'Invalid request',
      details: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    };
  }

  if (isCultivationError(err)) {
    return {
      statusCode: err.statusCode,
      code: err.code,
      message: err.message,
      details: err.details,
    };
  }

  if (err instanceof SessionLimitError) {
    return { statusCode: err.statusCode, code: err.code, message: err.message, details: { limit: err.limit } };
  }

  if (err instanceof Error) {
    const apiError: ApiError = err;
    const statusCode = apiError.statusCode ?? 500;
    return {
      statusCode,
      code: apiError.code ?? (statusCode < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR'),
      message: apiError.message,
      details: apiError.details,
      stack: apiError.stack,
    };
  }

  return { statusCode: 500, code: 'INTERNAL_ERROR', message: String(err) };
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { statusCode, code, message, details, stack } = normalize(err);

  if (statusCode >= 500) {
    apiLogger.error(message, { code, statusCode, stack });
  } else {
    apiLogger.debug(message, { code, statusCode });
  }

  // Don't leak error details in production
  const isProduction = process.env.NODE_ENV === 'production';
  const publicMessage = isProduction && statusCode === 500
    ? 'Internal server error'
    : message;

  res.status(statusCode).json({
    success: false,
    error: {
      code,
      message: publicMessage,
      ...(details && !isProduction ? { details } : {}),
    },
  });
}
