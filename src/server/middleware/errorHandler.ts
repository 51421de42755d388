import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../utils/logger';
import { isCommandError } from '../../shared/errors';
import { config } from '../config';

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export const errorHandler = (error: AppError, req: Request, res: Response, _next: NextFunction) => {
  let statusCode = error.statusCode || 500;
  let message = error.message || 'Internal Server Error';
  let code = error.code || 'INTERNAL_ERROR';

  if (error instanceof ZodError) {
    statusCode = 400;
    code = 'INVALID_REQUEST';
    // Use the first issue message when available, fall back to generic message
    if (error.issues.length > 0) {
      message = error.issues[0]?.message || message;
    }
  } else if (isCommandError(error)) {
    statusCode = error.httpStatus;
    code = error.code;
  }

  if (statusCode >= 500) {
    logger.error('Server Error:', {
      error: error.message,
      stack: error.stack,
      url: req.url,
      method: req.method,
    });
  } else {
    logger.warn('Client Error:', {
      error: error.message,
      url: req.url,
      method: req.method,
      statusCode,
    });
  }

  const includeDebugDetails = config.isDevelopment && statusCode >= 500;

  const errorResponse = {
    success: false,
    error: {
      message,
      code,
      timestamp: new Date().toISOString(),
      ...(includeDebugDetails && { stack: error.stack }),
    },
  };

  res.status(statusCode).json(errorResponse);
};

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void> | void;

export const asyncHandler = (fn: AsyncRequestHandler) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

export const createError = (message: string, statusCode: number = 500, code?: string): AppError => {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  if (code) {
    error.code = code;
  }
  error.isOperational = true;
  return error;
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(createError(`Route ${req.originalUrl} not found`, 404, 'NOT_FOUND'));
};
